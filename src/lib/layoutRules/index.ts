import type { ID, WardrobeProject } from '@/types/wardrobe';
import { ProblemCode, type Problem } from '@/core/contracts/project';
import { rectContainsRect, rectsIntersect } from '@/lib/geom';
import { frameInterior } from '@/core/project/frame';
import { drawerStackHeight } from '@/core/components/drawers';
import { componentRect, createComponentIndex } from '@/lib/spatial/componentIndex';

// Écart toléré entre somme des tiroirs et hauteur du bloc (mm)
const DRAWER_SUM_EPSILON = 0.01;

/**
 * Composants dont le rectangle n'est pas contenu dans l'intérieur du cadre.
 */
export function validateInsideFrame(project: WardrobeProject): { ok: boolean; outside: ID[] } {
  const interior = frameInterior(project.frame);
  const outside = project.components
    .filter((c) => !rectContainsRect(interior, componentRect(c)))
    .map((c) => c.id);
  return { ok: outside.length === 0, outside };
}

/**
 * Paires de composants qui se chevauchent (bords touchants exclus).
 * Shortlist R-tree puis test exact ; chaque paire une seule fois, dans l'ordre z.
 */
export function validateNoOverlap(project: WardrobeProject): {
  ok: boolean;
  conflicts: Array<[ID, ID]>;
} {
  const index = createComponentIndex(project.components);
  const byId = new Map(project.components.map((c, z) => [c.id, { c, z }]));
  const conflicts: Array<[ID, ID]> = [];

  project.components.forEach((a, za) => {
    for (const otherId of index.neighbors(a.id)) {
      const other = byId.get(otherId);
      if (!other || other.z <= za) continue;
      if (rectsIntersect(componentRect(a), componentRect(other.c))) {
        conflicts.push([a.id, other.c.id]);
      }
    }
  });

  return { ok: conflicts.length === 0, conflicts };
}

/** Blocs tiroirs dont la somme des hauteurs ne vaut plus la hauteur du bloc. */
export function validateDrawerHeights(project: WardrobeProject): { ok: boolean; mismatched: ID[] } {
  const mismatched: ID[] = [];
  for (const c of project.components) {
    if (c.componentType !== 'DRAWER_UNIT') continue;
    if (Math.abs(drawerStackHeight(c) - c.dimensions.height) > DRAWER_SUM_EPSILON) {
      mismatched.push(c.id);
    }
  }
  return { ok: mismatched.length === 0, mismatched };
}

/**
 * Tous les problèmes de mise en page, pour affichage. Aucun n'empêche l'édition.
 */
export function collectProblems(project: WardrobeProject): Problem[] {
  const problems: Problem[] = [];

  for (const id of validateInsideFrame(project).outside) {
    problems.push({
      code: ProblemCode.outside_frame_interior,
      severity: 'WARN',
      componentId: id,
      message: 'Component extends outside the frame interior',
    });
  }

  for (const [a, b] of validateNoOverlap(project).conflicts) {
    problems.push({
      code: ProblemCode.overlap,
      severity: 'WARN',
      componentId: a,
      otherId: b,
      message: 'Components overlap',
    });
  }

  for (const id of validateDrawerHeights(project).mismatched) {
    problems.push({
      code: ProblemCode.drawer_heights_mismatch,
      severity: 'WARN',
      componentId: id,
      message: 'Drawer heights do not add up to the unit height',
    });
  }

  return problems;
}
