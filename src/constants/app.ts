/**
 * Constantes applicatives : fichier projet, cadre par défaut, limites, zoom, historique
 */

import type { WardrobeFrame } from '@/types/wardrobe';

// ==================== FICHIER ====================
/** Extension des fichiers projet */
export const FILE_EXTENSION = '.wdp';

/** Suffixe de la copie de sauvegarde faite avant chaque écriture */
export const BACKUP_SUFFIX = '.bak';

// ==================== FORMAT DE FICHIER ====================
export const CURRENT_FILE_VERSION = '1.0';
export const SUPPORTED_FILE_VERSIONS: readonly string[] = Object.freeze([CURRENT_FILE_VERSION]);

// ==================== UNITÉS ====================
export const MM_PER_INCH = 25.4;
export const MM_PER_CM = 10;

// ==================== CADRE ====================
/**
 * Cadre par défaut (mm). Seule source des valeurs par défaut : le projet vide
 * et l'application partagent ces dimensions.
 */
export const DEFAULT_FRAME: Readonly<WardrobeFrame> = Object.freeze({
  width: 4800,
  height: 2400,
  depth: 600,
  panelThickness: 18,
  topClearance: 50,
  baseHeight: 100,
});

export const MIN_FRAME_WIDTH = 300;
export const MAX_FRAME_WIDTH = 6000;
export const MIN_FRAME_HEIGHT = 300;
export const MAX_FRAME_HEIGHT = 3000;
export const MIN_FRAME_DEPTH = 200;
export const MAX_FRAME_DEPTH = 1000;

export const DEFAULT_PROJECT_NAME = 'Untitled Wardrobe';

// ==================== GRILLE & VUE ====================
/** Pas de la grille de snap (mm) */
export const DEFAULT_GRID_SIZE_MM = 50;

export const DEFAULT_ZOOM_LEVEL = 1.0;
export const MIN_ZOOM_LEVEL = 0.1;
export const MAX_ZOOM_LEVEL = 5.0;
/** Facteur d'un pas de zoom avant/arrière */
export const ZOOM_FACTOR = 1.25;

// ==================== HISTORIQUE ====================
/** Profondeur max de l'historique undo (FIFO au-delà) */
export const MAX_UNDO_HISTORY = 50;

// ==================== COULEURS ====================
export const DEFAULT_COLORS = {
  frame: '#8B4513',
  panel: '#DEB887',
  shelf: '#D2B48C',
  divider: '#BC8F8F',
  drawer: '#E8D5B7',
  hanging: '#F5F0E6',
  overhead: '#D4C4B0',
  unknown: '#CCCCCC',
  door: '#CD853F',
  rail: '#A0A0A0',
  background: '#FFFFFF',
  selection: '#0078D7',
  hover: '#ADD8E6',
} as const;
