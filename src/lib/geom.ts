import type { Rect } from '@/types/wardrobe';

/**
 * Noyau géométrique : fonctions pures sur des nombres (mm ou unités surface).
 * Aucune ne dépend du sens de l'axe Y tant que les deux arguments partagent le même repère.
 */

/**
 * Teste si un point est dans un rectangle, bords inclus.
 */
export function pointInRect(
  x: number,
  y: number,
  rx: number,
  ry: number,
  rw: number,
  rh: number
): boolean {
  return rx <= x && x <= rx + rw && ry <= y && y <= ry + rh;
}

/**
 * Teste si deux rectangles se chevauchent.
 * Bords touchants = pas d'intersection (chevauchement sur intervalle ouvert).
 */
export function rectsIntersect(a: Rect, b: Rect): boolean {
  if (a.x + a.w <= b.x || b.x + b.w <= a.x) return false;
  if (a.y + a.h <= b.y || b.y + b.h <= a.y) return false;
  return true;
}

/**
 * Teste si `outer` contient entièrement `inner`, bords inclus.
 */
export function rectContainsRect(outer: Rect, inner: Rect): boolean {
  return (
    outer.x <= inner.x &&
    outer.y <= inner.y &&
    outer.x + outer.w >= inner.x + inner.w &&
    outer.y + outer.h >= inner.y + inner.h
  );
}

/**
 * Snap une valeur sur le multiple de grille le plus proche.
 *
 * Tie-break : arrondi au demi supérieur (vers +∞), celui de `Math.round` :
 * snapToGrid(15, 10) = 20, snapToGrid(-15, 10) = -10.
 * gridSize ≤ 0 → valeur inchangée.
 */
export function snapToGrid(value: number, gridSize: number): number {
  if (gridSize <= 0) return value;
  return Math.round(value / gridSize) * gridSize;
}

export function clamp(value: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, value));
}

/**
 * Facteur d'échelle qui fait tenir un contenu dans un conteneur en préservant le ratio.
 * L'axe le plus contraint l'emporte (jamais de rognage).
 * Retourne 1 si le contenu ou l'espace disponible (marges déduites) est non positif.
 */
export function calculateScaleToFit(
  contentW: number,
  contentH: number,
  containerW: number,
  containerH: number,
  margin = 0
): number {
  if (contentW <= 0 || contentH <= 0) return 1.0;

  const availableW = containerW - 2 * margin;
  const availableH = containerH - 2 * margin;
  if (availableW <= 0 || availableH <= 0) return 1.0;

  return Math.min(availableW / contentW, availableH / contentH);
}

/**
 * Décalage des faces "profondeur" (dessus et côté) d'un rectangle.
 * Le même décalage s'applique en X et en Y, d'où un angle apparent de 45° sur toutes les surfaces.
 */
export function depthOffset(depth: number, factor: number, cap: number): number {
  return Math.min(depth * factor, cap);
}
