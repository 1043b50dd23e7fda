/**
 * Constantes de rendu partagées par les trois surfaces (canvas, export image, impression)
 */

// ==================== PROFONDEUR SIMULÉE ====================
/**
 * Facteur de profondeur du cadre : décalage = profondeur (unités surface) × facteur,
 * appliqué à l'identique sur X et Y (faces à 45°).
 */
export const FRAME_DEPTH_FACTOR = 0.12;

/** Facteur de profondeur des composants */
export const COMPONENT_DEPTH_FACTOR = 0.15;

/** Décalage maximal des faces (unités surface) */
export const DEPTH_OFFSET_CAP = 80;

// ==================== CANVAS ====================
/** Marge autour du cadre dans le canvas interactif (px) */
export const CANVAS_MARGIN_PX = 20;

// ==================== EXPORT IMAGE ====================
export const EXPORT_IMAGE_WIDTH_PX = 2000;

/** Marge autour du cadre à l'export (mm, convertie en px à l'échelle calculée) */
export const EXPORT_MARGIN_MM = 50;

// ==================== IMPRESSION ====================
export const A4_WIDTH_MM = 210;
export const A4_HEIGHT_MM = 297;

export const PRINT_DPI = 300;

/** Marges de page (mm) */
export const PRINT_MARGINS_MM = Object.freeze({ left: 15, top: 20, right: 15, bottom: 15 });

/** Hauteur réservée au titre (px device) */
export const PRINT_TITLE_HEIGHT_PX = 60;

// ==================== DÉTAILS ====================
/** Retrait horizontal des rails de penderie (mm) */
export const RAIL_INSET_MM = 20;

/** Écart entre les deux rails d'une penderie double (mm) */
export const DOUBLE_RAIL_GAP_MM = 450;

/** Longueur d'une poignée barre / bouton (mm) */
export const BAR_HANDLE_MM = 40;
export const KNOB_HANDLE_MM = 10;

/** Rail plus haut que la penderie → ramené à cette fraction de sa hauteur */
export const RAIL_FALLBACK_RATIO = 0.9;

/** Second rail sous le bas de la penderie → remonté à cette distance du bas (mm) */
export const SECOND_RAIL_FLOOR_MM = 50;
