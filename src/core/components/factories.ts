import { randomUUID } from 'node:crypto';
import type {
  ClothingType,
  Component,
  DoorType,
  DrawerUnit,
  GenericComponent,
  HandleStyle,
  HangingSpace,
  ID,
  Milli,
  Overhead,
  RailType,
  Shelf,
} from '@/types/wardrobe';
import { equalDrawerHeights } from './drawers';

/**
 * Options communes à toutes les factories. Géométrie absente → taille nominale du variant.
 */
export type BaseOptions = {
  id?: ID;
  width?: Milli;
  height?: Milli;
  depth?: Milli;
  x?: Milli;
  y?: Milli;
  color?: string;
  label?: string;
  notes?: string;
  locked?: boolean;
};

export type DrawerUnitOptions = BaseOptions & {
  drawerCount?: number;
  drawerHeights?: Milli[];
  handleStyle?: HandleStyle;
};

export type HangingSpaceOptions = BaseOptions & {
  railHeight?: Milli;
  railType?: RailType;
  clothingType?: ClothingType;
};

export type ShelfOptions = BaseOptions & {
  adjustable?: boolean;
  shelfThickness?: Milli;
  loadCapacity?: number;
};

export type OverheadOptions = BaseOptions & {
  doorType?: DoorType;
  doorCount?: number;
  hasShelf?: boolean;
};

type NominalSize = { width: Milli; height: Milli; depth: Milli };

export const DRAWER_UNIT_DEFAULTS = {
  size: { width: 600, height: 800, depth: 500 },
  drawerCount: 3,
  handleStyle: 'bar',
} as const satisfies { size: NominalSize; drawerCount: number; handleStyle: HandleStyle };

export const HANGING_SPACE_DEFAULTS = {
  size: { width: 800, height: 1800, depth: 580 },
  railHeight: 1700,
  railType: 'single',
  clothingType: 'full_length',
} as const satisfies {
  size: NominalSize;
  railHeight: Milli;
  railType: RailType;
  clothingType: ClothingType;
};

export const SHELF_DEFAULTS = {
  size: { width: 800, height: 18, depth: 500 },
  adjustable: true,
  shelfThickness: 18,
  loadCapacity: 30,
} as const satisfies { size: NominalSize; adjustable: boolean; shelfThickness: Milli; loadCapacity: number };

export const OVERHEAD_DEFAULTS = {
  size: { width: 800, height: 400, depth: 580 },
  doorType: 'hinged',
  doorCount: 2,
  hasShelf: true,
} as const satisfies { size: NominalSize; doorType: DoorType; doorCount: number; hasShelf: boolean };

export const GENERIC_DEFAULTS = {
  size: { width: 18, height: 2000, depth: 580 },
} as const satisfies { size: NominalSize };

export function newComponentId(): ID {
  return randomUUID();
}

// Compteurs entiers ≥ 1 (tiroirs, portes)
export function atLeastOne(n: number): number {
  return Math.max(1, Math.trunc(n));
}

function baseFields(name: string, opts: BaseOptions, size: NominalSize) {
  return {
    id: opts.id ?? newComponentId(),
    name,
    dimensions: {
      width: opts.width ?? size.width,
      height: opts.height ?? size.height,
      depth: opts.depth ?? size.depth,
    },
    position: { x: opts.x ?? 0, y: opts.y ?? 0 },
    color: opts.color,
    label: opts.label,
    notes: opts.notes,
    locked: opts.locked ?? false,
  };
}

/**
 * Bloc tiroirs. Les hauteurs par défaut sont une répartition égale de la hauteur,
 * calculée une seule fois ici.
 */
export function createDrawerUnit(name: string, opts: DrawerUnitOptions = {}): DrawerUnit {
  const base = baseFields(name, opts, DRAWER_UNIT_DEFAULTS.size);
  const drawerCount = atLeastOne(opts.drawerCount ?? DRAWER_UNIT_DEFAULTS.drawerCount);
  const drawerHeights =
    opts.drawerHeights && opts.drawerHeights.length > 0
      ? [...opts.drawerHeights]
      : equalDrawerHeights(base.dimensions.height, drawerCount);

  return {
    ...base,
    componentType: 'DRAWER_UNIT',
    drawerCount,
    drawerHeights,
    handleStyle: opts.handleStyle ?? DRAWER_UNIT_DEFAULTS.handleStyle,
  };
}

export function createHangingSpace(name: string, opts: HangingSpaceOptions = {}): HangingSpace {
  return {
    ...baseFields(name, opts, HANGING_SPACE_DEFAULTS.size),
    componentType: 'HANGING_SPACE',
    railHeight: opts.railHeight ?? HANGING_SPACE_DEFAULTS.railHeight,
    railType: opts.railType ?? HANGING_SPACE_DEFAULTS.railType,
    clothingType: opts.clothingType ?? HANGING_SPACE_DEFAULTS.clothingType,
  };
}

export function createShelf(name: string, opts: ShelfOptions = {}): Shelf {
  return {
    ...baseFields(name, opts, SHELF_DEFAULTS.size),
    componentType: 'SHELF',
    adjustable: opts.adjustable ?? SHELF_DEFAULTS.adjustable,
    shelfThickness: opts.shelfThickness ?? SHELF_DEFAULTS.shelfThickness,
    loadCapacity: opts.loadCapacity ?? SHELF_DEFAULTS.loadCapacity,
  };
}

export function createOverhead(name: string, opts: OverheadOptions = {}): Overhead {
  return {
    ...baseFields(name, opts, OVERHEAD_DEFAULTS.size),
    componentType: 'OVERHEAD',
    doorType: opts.doorType ?? OVERHEAD_DEFAULTS.doorType,
    doorCount: atLeastOne(opts.doorCount ?? OVERHEAD_DEFAULTS.doorCount),
    hasShelf: opts.hasShelf ?? OVERHEAD_DEFAULTS.hasShelf,
  };
}

/**
 * Composant sans variant (montant, séparation). Forme de base uniquement.
 */
export function createGenericComponent(
  componentType: GenericComponent['componentType'],
  name: string,
  opts: BaseOptions = {}
): GenericComponent {
  return {
    ...baseFields(name, opts, GENERIC_DEFAULTS.size),
    componentType,
  };
}

/** Égalité structurelle par identité. */
export function sameComponent(a: Component, b: Component): boolean {
  return a.id === b.id;
}
