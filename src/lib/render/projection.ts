/**
 * Projection modèle → surface de rendu.
 *
 * Modèle : mm, origine en bas à gauche du cadre, Y vers le haut.
 * Surface : unités arbitraires (px écran, px image, px device), origine en haut à gauche, Y vers le bas.
 * Canvas, export image et impression construisent tous leur plan avec `buildRenderPlan`.
 */

import type {
  Component,
  Dimensions,
  ID,
  Position,
  Rect,
  WardrobeFrame,
  WardrobeProject,
} from '@/types/wardrobe';
import { DEFAULT_COLORS } from '@/constants/app';
import {
  BAR_HANDLE_MM,
  COMPONENT_DEPTH_FACTOR,
  DEPTH_OFFSET_CAP,
  DOUBLE_RAIL_GAP_MM,
  FRAME_DEPTH_FACTOR,
  KNOB_HANDLE_MM,
  RAIL_FALLBACK_RATIO,
  RAIL_INSET_MM,
  SECOND_RAIL_FLOOR_MM,
} from '@/constants/render';
import { calculateScaleToFit, depthOffset } from '@/lib/geom';

export type Point = { x: number; y: number };

/** Zone de dessin disponible, en unités surface. */
export type SurfaceRect = { x: number; y: number; width: number; height: number };

export interface SurfaceTransform {
  scale: number;
  originX: number;
  originY: number;
  frameHeight: number;
  toSurface(p: Point): Point;
  toModel(p: Point): Point;
}

/**
 * Échelle ajustée sur le cadre extérieur, cadre centré dans la surface.
 * `zoom` multiplie l'échelle ajustée (canvas interactif uniquement).
 */
export function createSurfaceTransform(
  frame: Pick<WardrobeFrame, 'width' | 'height'>,
  surface: SurfaceRect,
  margin = 0,
  zoom = 1
): SurfaceTransform {
  const scale = calculateScaleToFit(frame.width, frame.height, surface.width, surface.height, margin) * zoom;
  const originX = surface.x + (surface.width - frame.width * scale) / 2;
  const originY = surface.y + (surface.height - frame.height * scale) / 2;
  const H = frame.height;

  return {
    scale,
    originX,
    originY,
    frameHeight: H,
    toSurface: (p) => ({ x: originX + p.x * scale, y: originY + (H - p.y) * scale }),
    toModel: (p) => ({ x: (p.x - originX) / scale, y: H - (p.y - originY) / scale }),
  };
}

/** Rectangle surface (Y vers le bas) dont le coin haut-gauche est le coin haut-gauche du modèle. */
export function projectRect(t: SurfaceTransform, position: Position, dims: Pick<Dimensions, 'width' | 'height'>): Rect {
  const topLeft = t.toSurface({ x: position.x, y: position.y + dims.height });
  return { x: topLeft.x, y: topLeft.y, w: dims.width * t.scale, h: dims.height * t.scale };
}

export type DepthFaces = { top: Point[]; side: Point[]; offset: number };

/**
 * Faces dessus et côté droit, fuyant vers le haut-droite de `offset` sur les deux axes.
 */
export function depthFaces(r: Rect, offset: number): DepthFaces {
  const o = offset;
  return {
    offset: o,
    top: [
      { x: r.x, y: r.y },
      { x: r.x + o, y: r.y - o },
      { x: r.x + r.w + o, y: r.y - o },
      { x: r.x + r.w, y: r.y },
    ],
    side: [
      { x: r.x + r.w, y: r.y },
      { x: r.x + r.w + o, y: r.y - o },
      { x: r.x + r.w + o, y: r.y + r.h - o },
      { x: r.x + r.w, y: r.y + r.h },
    ],
  };
}

// ==================== DÉTAILS ====================

export type DetailKind = 'drawer' | 'handle' | 'rail' | 'rail_support' | 'door' | 'inner_shelf' | 'edge';

export type Segment = { kind: DetailKind; from: Point; to: Point };

function seg(kind: DetailKind, x1: number, y1: number, x2: number, y2: number): Segment {
  return { kind, from: { x: x1, y: y1 }, to: { x: x2, y: y2 } };
}

/** Détails intérieurs d'un composant, en coordonnées modèle. */
export function componentDetails(c: Component): Segment[] {
  const { x, y } = c.position;
  const { width: w, height: h } = c.dimensions;
  const out: Segment[] = [];

  switch (c.componentType) {
    case 'DRAWER_UNIT': {
      // Tiroirs empilés du bas vers le haut
      const handleLen =
        c.handleStyle === 'none' ? 0 : c.handleStyle === 'bar' ? BAR_HANDLE_MM : KNOB_HANDLE_MM;
      let bottom = y;
      c.drawerHeights.forEach((dh, i) => {
        if (handleLen > 0) {
          const cy = bottom + dh / 2;
          out.push(seg('handle', x + w / 2 - handleLen / 2, cy, x + w / 2 + handleLen / 2, cy));
        }
        bottom += dh;
        if (i < c.drawerHeights.length - 1) out.push(seg('drawer', x, bottom, x + w, bottom));
      });
      break;
    }
    case 'HANGING_SPACE': {
      const railY = y + (c.railHeight > h ? h * RAIL_FALLBACK_RATIO : c.railHeight);
      const left = x + RAIL_INSET_MM;
      const right = x + w - RAIL_INSET_MM;
      out.push(seg('rail', left, railY, right, railY));
      out.push(seg('rail_support', left, railY, left, y + h));
      out.push(seg('rail_support', right, railY, right, y + h));
      if (c.railType === 'double') {
        let lower = railY - DOUBLE_RAIL_GAP_MM;
        if (lower < y) lower = y + SECOND_RAIL_FLOOR_MM;
        out.push(seg('rail', left, lower, right, lower));
      }
      break;
    }
    case 'SHELF':
      out.push(seg('edge', x, y, x + w, y));
      break;
    case 'OVERHEAD': {
      const doorW = w / c.doorCount;
      for (let i = 1; i < c.doorCount; i++) {
        out.push(seg('door', x + i * doorW, y, x + i * doorW, y + h));
      }
      if (c.hasShelf) out.push(seg('inner_shelf', x, y + h / 2, x + w, y + h / 2));
      break;
    }
    case 'FRAME':
    case 'DIVIDER':
    case 'UNKNOWN':
      break;
  }
  return out;
}

export function fillColor(c: Component): string {
  if (c.color) return c.color;
  switch (c.componentType) {
    case 'DRAWER_UNIT':
      return DEFAULT_COLORS.drawer;
    case 'HANGING_SPACE':
      return DEFAULT_COLORS.hanging;
    case 'SHELF':
      return DEFAULT_COLORS.shelf;
    case 'OVERHEAD':
      return DEFAULT_COLORS.overhead;
    case 'FRAME':
      return DEFAULT_COLORS.frame;
    case 'DIVIDER':
      return DEFAULT_COLORS.divider;
    case 'UNKNOWN':
      return DEFAULT_COLORS.unknown;
  }
}

// ==================== PLAN ====================

export interface RenderItem {
  id: ID;
  componentType: Component['componentType'];
  rect: Rect;
  faces: DepthFaces;
  fill: string;
  label: string;
  selected: boolean;
  details: Segment[];
}

export interface RenderPlan {
  transform: SurfaceTransform;
  frame: {
    body: Rect;
    faces: DepthFaces;
    panels: { left: Rect; right: Rect; top: Rect; base: Rect };
  };
  /** Ordre z : premier dessiné en premier. */
  items: RenderItem[];
}

export type RenderOptions = {
  margin?: number;
  zoom?: number;
  selectedId?: ID;
};

export function buildRenderPlan(
  project: Pick<WardrobeProject, 'frame' | 'components'>,
  surface: SurfaceRect,
  options: RenderOptions = {}
): RenderPlan {
  const { frame } = project;
  const t = createSurfaceTransform(frame, surface, options.margin ?? 0, options.zoom ?? 1);
  const pt = frame.panelThickness;

  const body = projectRect(t, { x: 0, y: 0 }, frame);
  const frameFaces = depthFaces(body, depthOffset(frame.depth * t.scale, FRAME_DEPTH_FACTOR, DEPTH_OFFSET_CAP));

  const panels = {
    left: projectRect(t, { x: 0, y: 0 }, { width: pt, height: frame.height }),
    right: projectRect(t, { x: frame.width - pt, y: 0 }, { width: pt, height: frame.height }),
    top: projectRect(
      t,
      { x: 0, y: frame.height - frame.topClearance },
      { width: frame.width, height: frame.topClearance }
    ),
    base: projectRect(t, { x: 0, y: 0 }, { width: frame.width, height: frame.baseHeight }),
  };

  const items = project.components.map((c): RenderItem => {
    const rect = projectRect(t, c.position, c.dimensions);
    return {
      id: c.id,
      componentType: c.componentType,
      rect,
      faces: depthFaces(rect, depthOffset(c.dimensions.depth * t.scale, COMPONENT_DEPTH_FACTOR, DEPTH_OFFSET_CAP)),
      fill: fillColor(c),
      label: c.label || c.name,
      selected: c.id === options.selectedId,
      details: componentDetails(c).map((s) => ({
        kind: s.kind,
        from: t.toSurface(s.from),
        to: t.toSurface(s.to),
      })),
    };
  });

  return { transform: t, frame: { body, faces: frameFaces, panels }, items };
}
