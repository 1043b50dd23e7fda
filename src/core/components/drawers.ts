import type { DrawerUnit, Milli } from '@/types/wardrobe';

/**
 * Répartition égale de la hauteur d'un bloc tiroirs.
 */
export function equalDrawerHeights(height: Milli, count: number): Milli[] {
  if (count <= 0) return [];
  const h = height / count;
  return Array.from({ length: count }, () => h);
}

/**
 * Rescales stored drawer heights so they sum to `newHeight`, keeping their ratios.
 * Falls back to an equal split when the stored heights carry no usable ratio.
 */
export function rescaleDrawerHeights(heights: readonly Milli[], newHeight: Milli): Milli[] {
  const total = heights.reduce((sum, h) => sum + h, 0);
  if (heights.length === 0 || total <= 0) return equalDrawerHeights(newHeight, heights.length);
  const k = newHeight / total;
  return heights.map((h) => h * k);
}

/** Somme des hauteurs de tiroirs (doit valoir dimensions.height). */
export function drawerStackHeight(unit: DrawerUnit): Milli {
  return unit.drawerHeights.reduce((sum, h) => sum + h, 0);
}
