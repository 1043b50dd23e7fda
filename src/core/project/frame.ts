import type { ProjectMetadata, Rect, WardrobeFrame } from '@/types/wardrobe';
import {
  DEFAULT_FRAME,
  DEFAULT_PROJECT_NAME,
  MAX_FRAME_DEPTH,
  MAX_FRAME_HEIGHT,
  MAX_FRAME_WIDTH,
  MIN_FRAME_DEPTH,
  MIN_FRAME_HEIGHT,
  MIN_FRAME_WIDTH,
} from '@/constants/app';
import { clamp } from '@/lib/geom';

export function createFrame(overrides: Partial<WardrobeFrame> = {}): WardrobeFrame {
  return { ...DEFAULT_FRAME, ...overrides };
}

/** Largeur utile entre les deux montants latéraux. */
export function internalWidth(frame: WardrobeFrame): number {
  return frame.width - 2 * frame.panelThickness;
}

/** Hauteur utile entre le socle et le dégagement haut. */
export function internalHeight(frame: WardrobeFrame): number {
  return frame.height - frame.topClearance - frame.baseHeight;
}

/**
 * Intérieur du cadre dans le repère modèle (origine bas-gauche, Y vers le haut).
 */
export function frameInterior(frame: WardrobeFrame): Rect {
  return {
    x: frame.panelThickness,
    y: frame.baseHeight,
    w: internalWidth(frame),
    h: internalHeight(frame),
  };
}

export function clampFrame(frame: WardrobeFrame): WardrobeFrame {
  return {
    ...frame,
    width: clamp(frame.width, MIN_FRAME_WIDTH, MAX_FRAME_WIDTH),
    height: clamp(frame.height, MIN_FRAME_HEIGHT, MAX_FRAME_HEIGHT),
    depth: clamp(frame.depth, MIN_FRAME_DEPTH, MAX_FRAME_DEPTH),
  };
}

export function createMetadata(
  overrides: Partial<ProjectMetadata> = {},
  now: Date = new Date()
): ProjectMetadata {
  const stamp = now.toISOString();
  return {
    projectName: DEFAULT_PROJECT_NAME,
    clientName: '',
    clientAddress: '',
    clientPhone: '',
    notes: '',
    createdDate: stamp,
    modifiedDate: stamp,
    ...overrides,
  };
}
