/**
 * Schema of the project file format, version "1.0".
 * Keys are snake_case on disk; the in-memory model is camelCase.
 */

import { SUPPORTED_FILE_VERSIONS } from '@/constants/app';
import type {
  ClothingType,
  DoorType,
  HandleStyle,
  RailType,
  UnitSystem,
} from '@/types/wardrobe';

export type DimensionsRecord = { width: number; height: number; depth: number };
export type PositionRecord = { x: number; y: number };

export type ComponentRecordBase = {
  id: string;
  component_type: string;
  name: string;
  dimensions: DimensionsRecord;
  position: PositionRecord;
  color: string | null;
  label: string | null;
  notes: string | null;
  locked: boolean;
};

export type DrawerUnitRecord = ComponentRecordBase & {
  component_type: 'DRAWER_UNIT';
  drawer_count: number;
  drawer_heights: number[];
  handle_style: HandleStyle;
};

export type HangingSpaceRecord = ComponentRecordBase & {
  component_type: 'HANGING_SPACE';
  rail_height: number;
  rail_type: RailType;
  clothing_type: ClothingType;
};

export type ShelfRecord = ComponentRecordBase & {
  component_type: 'SHELF';
  adjustable: boolean;
  shelf_thickness: number;
  load_capacity: number;
};

export type OverheadRecord = ComponentRecordBase & {
  component_type: 'OVERHEAD';
  door_type: DoorType;
  door_count: number;
  has_shelf: boolean;
};

export type ComponentRecord =
  | DrawerUnitRecord
  | HangingSpaceRecord
  | ShelfRecord
  | OverheadRecord
  | ComponentRecordBase;

export type MetadataRecord = {
  project_name: string;
  client_name: string;
  client_address: string;
  client_phone: string;
  notes: string;
  created_date: string;
  modified_date: string;
};

export type FrameRecord = {
  width: number;
  height: number;
  depth: number;
  panel_thickness: number;
  top_clearance: number;
  base_height: number;
};

export type ProjectFileV1 = {
  version: string;
  metadata: MetadataRecord;
  unit_system: UnitSystem;
  frame: FrameRecord;
  components: ComponentRecord[];
  view_state: {
    zoom_level: number;
    scroll_position: [number, number];
  };
};

export function isSupportedVersion(version: unknown): version is string {
  return typeof version === 'string' && SUPPORTED_FILE_VERSIONS.includes(version);
}
