import { describe, it, expect } from 'vitest';
import { collectProblems, validateDrawerHeights, validateInsideFrame, validateNoOverlap } from './index';
import { createProject } from '@/core/project';
import { createDrawerUnit, createShelf } from '@/core/components';
import { ProblemCode } from '@/core/contracts/project';

// Cadre par défaut : intérieur x ∈ [18, 4782], y ∈ [100, 2350]

describe('validateInsideFrame', () => {
  it('accepts a component flush with the interior edges', () => {
    const p = createProject({ components: [createShelf('s', { id: 'a', x: 18, y: 100, width: 4764 })] });
    expect(validateInsideFrame(p)).toEqual({ ok: true, outside: [] });
  });

  it('flags components crossing the side panel or the base band', () => {
    const p = createProject({
      components: [
        createShelf('left', { id: 'left', x: 10, y: 500 }),
        createShelf('ok', { id: 'ok', x: 500, y: 500 }),
        createShelf('low', { id: 'low', x: 500, y: 90 }),
      ],
    });
    expect(validateInsideFrame(p)).toEqual({ ok: false, outside: ['left', 'low'] });
  });
});

describe('validateNoOverlap', () => {
  it('edge-touching neighbours do not conflict', () => {
    const p = createProject({
      components: [
        createShelf('a', { id: 'a', x: 100, y: 500, width: 400 }),
        createShelf('b', { id: 'b', x: 500, y: 500, width: 400 }),
      ],
    });
    expect(validateNoOverlap(p)).toEqual({ ok: true, conflicts: [] });
  });

  it('reports each overlapping pair once, in z-order', () => {
    const p = createProject({
      components: [
        createDrawerUnit('d', { id: 'd', x: 100, y: 100 }),
        createShelf('s1', { id: 's1', x: 300, y: 400 }),
        createShelf('s2', { id: 's2', x: 2000, y: 400 }),
        createShelf('s3', { id: 's3', x: 650, y: 405 }),
      ],
    });
    expect(validateNoOverlap(p)).toEqual({
      ok: false,
      conflicts: [
        ['d', 's1'],
        ['d', 's3'],
        ['s1', 's3'],
      ],
    });
  });
});

describe('validateDrawerHeights', () => {
  it('flags a unit whose height changed without its drawers', () => {
    const good = createDrawerUnit('g', { id: 'g' });
    const bad = createDrawerUnit('b', { id: 'b' });
    bad.dimensions.height = 900;
    const p = createProject({ components: [good, bad] });
    expect(validateDrawerHeights(p)).toEqual({ ok: false, mismatched: ['b'] });
  });
});

describe('collectProblems', () => {
  it('lists every problem with its code', () => {
    const p = createProject({
      components: [
        createShelf('a', { id: 'a', x: 0, y: 500 }),
        createShelf('b', { id: 'b', x: 400, y: 505 }),
      ],
    });
    expect(collectProblems(p)).toEqual([
      {
        code: ProblemCode.outside_frame_interior,
        severity: 'WARN',
        componentId: 'a',
        message: 'Component extends outside the frame interior',
      },
      {
        code: ProblemCode.overlap,
        severity: 'WARN',
        componentId: 'a',
        otherId: 'b',
        message: 'Components overlap',
      },
    ]);
  });

  it('an empty project has no problems', () => {
    expect(collectProblems(createProject())).toEqual([]);
  });
});
