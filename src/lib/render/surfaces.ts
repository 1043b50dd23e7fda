import type { ID, WardrobeFrame, WardrobeProject } from '@/types/wardrobe';
import { MM_PER_INCH } from '@/constants/app';
import {
  A4_HEIGHT_MM,
  A4_WIDTH_MM,
  CANVAS_MARGIN_PX,
  EXPORT_IMAGE_WIDTH_PX,
  EXPORT_MARGIN_MM,
  PRINT_DPI,
  PRINT_MARGINS_MM,
  PRINT_TITLE_HEIGHT_PX,
} from '@/constants/render';
import { calculateScaleToFit } from '@/lib/geom';
import { buildRenderPlan, type RenderPlan, type SurfaceRect } from './projection';

type PlanSource = Pick<WardrobeProject, 'frame' | 'components'>;

/**
 * Marge de `EXPORT_MARGIN_MM` autour du cadre, exprimée en unités surface à l'échelle
 * ajustée sur (cadre + marges). Même résultat qu'un rendu de la zone source élargie.
 */
export function sourceMarginPx(frame: Pick<WardrobeFrame, 'width' | 'height'>, target: SurfaceRect): number {
  const s = calculateScaleToFit(
    frame.width + 2 * EXPORT_MARGIN_MM,
    frame.height + 2 * EXPORT_MARGIN_MM,
    target.width,
    target.height
  );
  return EXPORT_MARGIN_MM * s;
}

// ==================== CANVAS ====================

export function canvasPlan(
  project: Pick<WardrobeProject, 'frame' | 'components' | 'zoomLevel'>,
  viewport: { width: number; height: number },
  selectedId?: ID
): RenderPlan {
  return buildRenderPlan(
    project,
    { x: 0, y: 0, width: viewport.width, height: viewport.height },
    { margin: CANVAS_MARGIN_PX, zoom: project.zoomLevel, selectedId }
  );
}

// ==================== EXPORT IMAGE ====================

export type ImageExport = { width: number; height: number; plan: RenderPlan };

/** Hauteur tronquée à l'entier, ratio du cadre conservé. */
export function exportImageSize(frame: Pick<WardrobeFrame, 'width' | 'height'>, width = EXPORT_IMAGE_WIDTH_PX) {
  return { width, height: Math.trunc((width * frame.height) / frame.width) };
}

export function imageExportPlan(project: PlanSource, width = EXPORT_IMAGE_WIDTH_PX): ImageExport {
  const size = exportImageSize(project.frame, width);
  const surface = { x: 0, y: 0, ...size };
  const plan = buildRenderPlan(project, surface, { margin: sourceMarginPx(project.frame, surface) });
  return { ...size, plan };
}

// ==================== IMPRESSION ====================

export type PageOrientation = 'portrait' | 'landscape';

export interface PrintLayout {
  orientation: PageOrientation;
  dpi: number;
  page: { width: number; height: number };
  /** Zone imprimable (marges déduites) */
  printable: SurfaceRect;
  title?: { text: string; rect: SurfaceRect };
  content: SurfaceRect;
  plan: RenderPlan;
}

function mmToDevice(mm: number, dpi: number): number {
  return Math.round((mm * dpi) / MM_PER_INCH);
}

export function printLayout(
  project: PlanSource,
  options: { title?: string; dpi?: number } = {}
): PrintLayout {
  const dpi = options.dpi ?? PRINT_DPI;
  const orientation: PageOrientation = project.frame.width > project.frame.height ? 'landscape' : 'portrait';
  const [pageWmm, pageHmm] =
    orientation === 'landscape' ? [A4_HEIGHT_MM, A4_WIDTH_MM] : [A4_WIDTH_MM, A4_HEIGHT_MM];

  const page = { width: mmToDevice(pageWmm, dpi), height: mmToDevice(pageHmm, dpi) };
  const left = mmToDevice(PRINT_MARGINS_MM.left, dpi);
  const top = mmToDevice(PRINT_MARGINS_MM.top, dpi);
  const printable: SurfaceRect = {
    x: left,
    y: top,
    width: page.width - left - mmToDevice(PRINT_MARGINS_MM.right, dpi),
    height: page.height - top - mmToDevice(PRINT_MARGINS_MM.bottom, dpi),
  };

  let content = printable;
  let title: PrintLayout['title'];
  if (options.title) {
    title = { text: options.title, rect: { ...printable, height: PRINT_TITLE_HEIGHT_PX } };
    content = {
      ...printable,
      y: printable.y + PRINT_TITLE_HEIGHT_PX,
      height: printable.height - PRINT_TITLE_HEIGHT_PX,
    };
  }

  const plan = buildRenderPlan(project, content, { margin: sourceMarginPx(project.frame, content) });
  return { orientation, dpi, page, printable, title, content, plan };
}
