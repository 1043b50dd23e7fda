import type { Component, GenericComponent } from '@/types/wardrobe';
import {
  CLOTHING_TYPES,
  DOOR_TYPES,
  HANDLE_STYLES,
  RAIL_TYPES,
} from '@/types/wardrobe';
import { ErrorCode, fail, ok, type Result } from '@/core/contracts/project';
import { RecordReader, isJsonObject } from '@/lib/io/fields';
import type { ComponentRecord, ComponentRecordBase } from '@/lib/io/schema';
import {
  DRAWER_UNIT_DEFAULTS,
  HANGING_SPACE_DEFAULTS,
  OVERHEAD_DEFAULTS,
  SHELF_DEFAULTS,
  createDrawerUnit,
  createGenericComponent,
  createHangingSpace,
  createOverhead,
  createShelf,
  type BaseOptions,
} from './factories';

function baseRecord(c: Component): ComponentRecordBase {
  return {
    id: c.id,
    component_type:
      c.componentType === 'UNKNOWN' ? c.sourceType ?? c.componentType : c.componentType,
    name: c.name,
    dimensions: { ...c.dimensions },
    position: { ...c.position },
    color: c.color ?? null,
    label: c.label ?? null,
    notes: c.notes ?? null,
    locked: c.locked,
  };
}

/**
 * Component → record JSON. Chaque variant écrit les champs de base puis les siens.
 */
export function componentToRecord(c: Component): ComponentRecord {
  switch (c.componentType) {
    case 'DRAWER_UNIT':
      return {
        ...baseRecord(c),
        component_type: 'DRAWER_UNIT',
        drawer_count: c.drawerCount,
        drawer_heights: [...c.drawerHeights],
        handle_style: c.handleStyle,
      };
    case 'HANGING_SPACE':
      return {
        ...baseRecord(c),
        component_type: 'HANGING_SPACE',
        rail_height: c.railHeight,
        rail_type: c.railType,
        clothing_type: c.clothingType,
      };
    case 'SHELF':
      return {
        ...baseRecord(c),
        component_type: 'SHELF',
        adjustable: c.adjustable,
        shelf_thickness: c.shelfThickness,
        load_capacity: c.loadCapacity,
      };
    case 'OVERHEAD':
      return {
        ...baseRecord(c),
        component_type: 'OVERHEAD',
        door_type: c.doorType,
        door_count: c.doorCount,
        has_shelf: c.hasShelf,
      };
    case 'FRAME':
    case 'DIVIDER':
    case 'UNKNOWN':
      return baseRecord(c);
  }
}

function readBase(r: RecordReader): BaseOptions & { name: string } {
  const dims = r.child('dimensions');
  const pos = r.child('position');
  return {
    id: r.string('id'),
    name: r.string('name'),
    width: dims.number('width'),
    height: dims.number('height'),
    depth: dims.number('depth'),
    x: pos.number('x'),
    y: pos.number('y'),
    color: r.nullableString('color'),
    label: r.nullableString('label'),
    notes: r.nullableString('notes'),
    locked: r.optBoolean('locked', false),
  };
}

/**
 * Record → Component, dispatch sur `component_type`.
 *
 * Un discriminant inconnu ne fait pas échouer la lecture : l'entrée est dégradée en
 * forme de base (champs spécifiques perdus), son tag d'origine est conservé.
 */
export function readComponent(r: RecordReader): Component {
  const tag = r.string('component_type');
  const { name, ...base } = readBase(r);

  switch (tag) {
    case 'DRAWER_UNIT':
      return createDrawerUnit(name, {
        ...base,
        drawerCount: r.optNumber('drawer_count', DRAWER_UNIT_DEFAULTS.drawerCount),
        drawerHeights: r.optNumberArray('drawer_heights', []),
        handleStyle: r.optOneOf('handle_style', HANDLE_STYLES, DRAWER_UNIT_DEFAULTS.handleStyle),
      });
    case 'HANGING_SPACE':
      return createHangingSpace(name, {
        ...base,
        railHeight: r.optNumber('rail_height', HANGING_SPACE_DEFAULTS.railHeight),
        railType: r.optOneOf('rail_type', RAIL_TYPES, HANGING_SPACE_DEFAULTS.railType),
        clothingType: r.optOneOf('clothing_type', CLOTHING_TYPES, HANGING_SPACE_DEFAULTS.clothingType),
      });
    case 'SHELF':
      return createShelf(name, {
        ...base,
        adjustable: r.optBoolean('adjustable', SHELF_DEFAULTS.adjustable),
        shelfThickness: r.optNumber('shelf_thickness', SHELF_DEFAULTS.shelfThickness),
        loadCapacity: r.optNumber('load_capacity', SHELF_DEFAULTS.loadCapacity),
      });
    case 'OVERHEAD':
      return createOverhead(name, {
        ...base,
        doorType: r.optOneOf('door_type', DOOR_TYPES, OVERHEAD_DEFAULTS.doorType),
        doorCount: r.optNumber('door_count', OVERHEAD_DEFAULTS.doorCount),
        hasShelf: r.optBoolean('has_shelf', OVERHEAD_DEFAULTS.hasShelf),
      });
    case 'FRAME':
    case 'DIVIDER':
      return createGenericComponent(tag, name, base);
    default: {
      const degraded: GenericComponent = createGenericComponent('UNKNOWN', name, base);
      if (!r.issue) {
        console.warn(
          `[codec] unknown component_type "${tag}" at ${r.path || 'component'}, kept as a plain component`
        );
        degraded.sourceType = tag;
      }
      return degraded;
    }
  }
}

export function componentFromRecord(data: unknown, path = 'component'): Result<Component> {
  if (!isJsonObject(data)) {
    return fail(ErrorCode.InvalidFormat, `Expected an object: ${path}`, path);
  }
  const reader = RecordReader.of(data, path);
  const component = readComponent(reader);
  return reader.issue ? { ok: false, error: reader.issue } : ok(component);
}
