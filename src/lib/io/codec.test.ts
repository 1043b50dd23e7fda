import { describe, it, expect, vi, afterEach } from 'vitest';
import { parseProjectJson, projectFromFile, projectToFile, stringifyProject } from './codec';
import { isSupportedVersion } from './schema';
import { createProject, addComponent } from '@/core/project';
import { createDrawerUnit, createHangingSpace, createOverhead, createShelf } from '@/core/components';
import { ErrorCode } from '@/core/contracts/project';

afterEach(() => {
  vi.restoreAllMocks();
});

function sampleProject() {
  const p = createProject({
    metadata: { projectName: 'Hall', clientName: 'Client A', createdDate: '2025-01-01T00:00:00.000Z' },
    unitSystem: 'IMPERIAL',
    frame: { width: 3000, height: 2200 },
    zoomLevel: 1.5,
    scrollPosition: [120, -40],
  });
  addComponent(p, createDrawerUnit('Drawers', { x: 18, y: 100 }));
  addComponent(p, createHangingSpace('Rail', { x: 618, y: 100, railType: 'double' }));
  addComponent(p, createShelf('Shelf', { x: 1418, y: 1200 }));
  addComponent(p, createOverhead('Top', { x: 18, y: 1850, doorType: 'lift_up' }));
  return p;
}

function minimalDoc(extra: Record<string, unknown> = {}) {
  return { version: '1.0', ...extra };
}

describe('isSupportedVersion', () => {
  it('accepts only "1.0"', () => {
    expect(isSupportedVersion('1.0')).toBe(true);
    expect(isSupportedVersion('0.9')).toBe(false);
    expect(isSupportedVersion(1)).toBe(false);
  });
});

describe('project round trip', () => {
  it('fromFile(toFile(p)) reproduces p', () => {
    const p = sampleProject();
    expect(projectFromFile(projectToFile(p))).toEqual({ ok: true, value: p });
  });

  it('through JSON text', () => {
    const p = sampleProject();
    const res = parseProjectJson(stringifyProject(p));
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.value.components.map((c) => c.name)).toEqual(['Drawers', 'Rail', 'Shelf', 'Top']);
    expect(res.value).toEqual(p);
  });

  it('writes snake_case document keys with 2-space indent', () => {
    const p = createProject({ frame: { width: 1000 } });
    const text = stringifyProject(p);
    const doc = projectToFile(p);
    expect(text).toBe(JSON.stringify(doc, null, 2));
    expect(doc.frame).toEqual({
      width: 1000,
      height: 2400,
      depth: 600,
      panel_thickness: 18,
      top_clearance: 50,
      base_height: 100,
    });
    expect(doc.view_state).toEqual({ zoom_level: 1, scroll_position: [0, 0] });
    expect(text.split('\n')[1]).toBe('  "version": "1.0",');
  });
});

describe('load gates', () => {
  it('malformed JSON → InvalidFormat', () => {
    const res = parseProjectJson('{ nope');
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.code).toBe(ErrorCode.InvalidFormat);
    expect(res.error.message.startsWith('Invalid file format: ')).toBe(true);
  });

  it('non-object document → InvalidFormat', () => {
    expect(projectFromFile([1, 2])).toEqual({
      ok: false,
      error: { code: ErrorCode.InvalidFormat, message: 'Invalid file format: expected a JSON object' },
    });
  });

  it('unsupported version wins over field problems', () => {
    expect(projectFromFile({ version: '0.9', components: [{}] })).toEqual({
      ok: false,
      error: { code: ErrorCode.UnsupportedVersion, message: 'Unsupported file version: 0.9', field: 'version' },
    });
  });

  it('missing version → MissingField', () => {
    const res = projectFromFile({ components: [] });
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.code).toBe(ErrorCode.MissingField);
    expect(res.error.field).toBe('version');
  });

  it('missing component field names its dotted path', () => {
    const good = projectToFile(sampleProject()).components[0];
    const bad = { ...good, position: { y: 100 } };
    const res = projectFromFile(minimalDoc({ components: [good, bad] }));
    expect(res).toEqual({
      ok: false,
      error: {
        code: ErrorCode.MissingField,
        field: 'components[1].position.x',
        message: 'Missing required field: components[1].position.x',
      },
    });
  });

  it('unknown unit system → InvalidFormat', () => {
    const res = projectFromFile(minimalDoc({ unit_system: 'FURLONGS' }));
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.code).toBe(ErrorCode.InvalidFormat);
    expect(res.error.field).toBe('unit_system');
  });

  it('wrong type in frame → InvalidFormat', () => {
    const res = projectFromFile(minimalDoc({ frame: { width: '2400' } }));
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error).toEqual({
      code: ErrorCode.InvalidFormat,
      field: 'frame.width',
      message: 'Expected a number: frame.width',
    });
  });

  it('scroll position must be a pair', () => {
    const res = projectFromFile(minimalDoc({ view_state: { scroll_position: [1, 2, 3] } }));
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.field).toBe('view_state.scroll_position');
  });

  it('a component entry that is not an object → InvalidFormat', () => {
    const res = projectFromFile(minimalDoc({ components: ['x'] }));
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.field).toBe('components[0]');
  });
});

describe('defaults', () => {
  it('a bare versioned document loads with defaults', () => {
    const res = projectFromFile(minimalDoc());
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    const p = res.value;
    expect(p.metadata.projectName).toBe('Untitled Wardrobe');
    expect(p.unitSystem).toBe('METRIC');
    expect(p.frame.width).toBe(4800);
    expect(p.components).toEqual([]);
    expect(p.zoomLevel).toBe(1);
    expect(p.scrollPosition).toEqual([0, 0]);
  });

  it('unknown component types load as plain components', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const res = projectFromFile(
      minimalDoc({
        components: [
          {
            id: 'm-1',
            component_type: 'MIRROR',
            name: 'Mirror',
            dimensions: { width: 400, height: 1200, depth: 10 },
            position: { x: 50, y: 300 },
          },
        ],
      })
    );
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.value.components[0].componentType).toBe('UNKNOWN');
    expect(warn).toHaveBeenCalledWith(
      '[codec] unknown component_type "MIRROR" at components[0], kept as a plain component'
    );
    expect(projectToFile(res.value).components[0].component_type).toBe('MIRROR');
  });
});
