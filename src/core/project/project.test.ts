import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  addComponent,
  clampFrame,
  createFrame,
  createProject,
  frameInterior,
  getComponent,
  internalHeight,
  internalWidth,
  removeComponent,
} from '@/core/project';
import { createDrawerUnit, createShelf } from '@/core/components';

describe('frame', () => {
  it('default frame and derived interior', () => {
    const f = createFrame();
    expect(f).toEqual({
      width: 4800,
      height: 2400,
      depth: 600,
      panelThickness: 18,
      topClearance: 50,
      baseHeight: 100,
    });
    expect(internalWidth(f)).toBe(4764);
    expect(internalHeight(f)).toBe(2250);
    expect(frameInterior(f)).toEqual({ x: 18, y: 100, w: 4764, h: 2250 });
  });

  it('clampFrame applies the size limits', () => {
    const f = clampFrame(createFrame({ width: 8000, height: 100, depth: 650 }));
    expect([f.width, f.height, f.depth]).toEqual([6000, 300, 650]);
  });
});

describe('project aggregate', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2025-03-01T10:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('createProject defaults', () => {
    const p = createProject();
    expect(p.version).toBe('1.0');
    expect(p.unitSystem).toBe('METRIC');
    expect(p.components).toEqual([]);
    expect(p.zoomLevel).toBe(1);
    expect(p.scrollPosition).toEqual([0, 0]);
    expect(p.metadata.projectName).toBe('Untitled Wardrobe');
    expect(p.metadata.createdDate).toBe('2025-03-01T10:00:00.000Z');
  });

  it('add keeps insertion order and stamps modifiedDate', () => {
    const p = createProject();
    const a = createShelf('a');
    const b = createDrawerUnit('b');
    vi.setSystemTime(new Date('2025-03-02T08:00:00.000Z'));
    addComponent(p, a);
    addComponent(p, b);
    expect(p.components.map((c) => c.name)).toEqual(['a', 'b']);
    expect(p.metadata.modifiedDate).toBe('2025-03-02T08:00:00.000Z');
    expect(p.metadata.createdDate).toBe('2025-03-01T10:00:00.000Z');
  });

  it('remove returns the component and stamps modifiedDate', () => {
    const p = createProject();
    const a = createShelf('a');
    addComponent(p, a);
    vi.setSystemTime(new Date('2025-03-05T00:00:00.000Z'));
    expect(removeComponent(p, a.id)).toBe(a);
    expect(p.components).toEqual([]);
    expect(p.metadata.modifiedDate).toBe('2025-03-05T00:00:00.000Z');
  });

  it('remove of an unknown id is a no-op', () => {
    const p = createProject();
    vi.setSystemTime(new Date('2025-04-01T00:00:00.000Z'));
    expect(removeComponent(p, 'missing')).toBeUndefined();
    expect(p.metadata.modifiedDate).toBe('2025-03-01T10:00:00.000Z');
  });

  it('a direct rename does not stamp modifiedDate', () => {
    const p = createProject();
    const a = createShelf('a');
    addComponent(p, a);
    const before = p.metadata.modifiedDate;
    vi.setSystemTime(new Date('2025-06-01T00:00:00.000Z'));
    const found = getComponent(p, a.id);
    expect(found).toBe(a);
    if (found) found.name = 'renamed';
    expect(p.metadata.modifiedDate).toBe(before);
  });

  it('ids stay unique across add/remove sequences', () => {
    const p = createProject();
    const made = Array.from({ length: 6 }, (_, i) => createShelf(`s${i}`));
    made.forEach((c) => addComponent(p, c));
    removeComponent(p, made[1].id);
    removeComponent(p, made[4].id);
    addComponent(p, createShelf('late'));
    const ids = p.components.map((c) => c.id);
    expect(new Set(ids).size).toBe(ids.length);
    expect(getComponent(p, made[1].id)).toBeUndefined();
  });
});
