// Types de base du modèle (V1). Toutes les longueurs sont en millimètres.

export type Milli = number;
export type ID = string;
export type ISODate = string;

export type Dimensions = {
  width: Milli;
  height: Milli;
  depth: Milli;
};

/** Repère cadre : origine en bas à gauche, Y vers le haut. */
export type Position = {
  x: Milli;
  y: Milli;
};

/** Rectangle axis-aligned, même convention que la position qui l'origine. */
export type Rect = {
  x: Milli;
  y: Milli;
  w: Milli;
  h: Milli;
};

export const COMPONENT_TYPES = [
  'DRAWER_UNIT',
  'HANGING_SPACE',
  'SHELF',
  'OVERHEAD',
  'FRAME',
  'DIVIDER',
] as const;

export type ComponentType = (typeof COMPONENT_TYPES)[number];

/** Types backed by a dedicated variant (and factory). */
export type VariantType = 'DRAWER_UNIT' | 'HANGING_SPACE' | 'SHELF' | 'OVERHEAD';

/**
 * Discriminator of a component held in memory. `UNKNOWN` marks an entry whose
 * file tag was not recognised; it keeps the base fields only.
 */
export type ComponentKind = ComponentType | 'UNKNOWN';

export const HANDLE_STYLES = ['bar', 'knob', 'recessed', 'none'] as const;
export type HandleStyle = (typeof HANDLE_STYLES)[number];

export const RAIL_TYPES = ['single', 'double'] as const;
export type RailType = (typeof RAIL_TYPES)[number];

export const CLOTHING_TYPES = ['full_length', 'half_length', 'shirts'] as const;
export type ClothingType = (typeof CLOTHING_TYPES)[number];

export const DOOR_TYPES = ['hinged', 'lift_up', 'sliding'] as const;
export type DoorType = (typeof DOOR_TYPES)[number];

export const UNIT_SYSTEMS = ['METRIC', 'IMPERIAL'] as const;
export type UnitSystem = (typeof UNIT_SYSTEMS)[number];

type ComponentBase = {
  readonly id: ID; // immuable : clé d'identité unique (lookup, suppression, sélection)
  name: string;
  dimensions: Dimensions;
  position: Position;
  color?: string;
  label?: string;
  notes?: string;
  locked: boolean;
};

export type DrawerUnit = ComponentBase & {
  componentType: 'DRAWER_UNIT';
  drawerCount: number;
  drawerHeights: Milli[]; // ordre bas → haut
  handleStyle: HandleStyle;
};

export type HangingSpace = ComponentBase & {
  componentType: 'HANGING_SPACE';
  railHeight: Milli; // depuis le bas du composant
  railType: RailType;
  clothingType: ClothingType;
};

export type Shelf = ComponentBase & {
  componentType: 'SHELF';
  adjustable: boolean;
  shelfThickness: Milli;
  loadCapacity: number; // kg, informatif
};

export type Overhead = ComponentBase & {
  componentType: 'OVERHEAD';
  doorType: DoorType;
  doorCount: number;
  hasShelf: boolean;
};

export type GenericComponent = ComponentBase & {
  componentType: 'FRAME' | 'DIVIDER' | 'UNKNOWN';
  /** Tag read from the file when it was not recognised; written back on save. */
  sourceType?: string;
};

export type Component = DrawerUnit | HangingSpace | Shelf | Overhead | GenericComponent;

export type WardrobeFrame = {
  width: Milli;
  height: Milli;
  depth: Milli;
  panelThickness: Milli;
  topClearance: Milli;
  baseHeight: Milli;
};

export type ProjectMetadata = {
  projectName: string;
  clientName: string;
  clientAddress: string;
  clientPhone: string;
  notes: string;
  createdDate: ISODate;
  modifiedDate: ISODate;
};

export type WardrobeProject = {
  version: string;
  metadata: ProjectMetadata;
  unitSystem: UnitSystem;
  frame: WardrobeFrame;
  components: Component[]; // ordre d'insertion = ordre z = ordre de liste
  zoomLevel: number;
  scrollPosition: [number, number];
};
