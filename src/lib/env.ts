/**
 * Configuration d'exécution : constantes applicatives, surchargées par variables d'environnement.
 */

import { DEFAULT_GRID_SIZE_MM, MAX_UNDO_HISTORY } from '@/constants/app';

export type Env = Record<string, string | undefined>;

export type PlannerConfig = {
  gridSizeMm: number;
  historyLimit: number;
  snapToGrid: boolean;
  debug: boolean;
};

function readBool(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') return fallback;
  return raw.trim().toLowerCase() === 'true';
}

// Entier strictement positif, sinon fallback
function readPositiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const n = Number(raw.trim());
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

export function loadConfig(env: Env = process.env): PlannerConfig {
  return {
    gridSizeMm: readPositiveInt(env.WARDROBE_GRID_SIZE_MM, DEFAULT_GRID_SIZE_MM),
    historyLimit: readPositiveInt(env.WARDROBE_HISTORY_LIMIT, MAX_UNDO_HISTORY),
    snapToGrid: readBool(env.WARDROBE_SNAP_TO_GRID, true),
    debug: readBool(env.WARDROBE_DEBUG, false),
  };
}

export function isDebug(env: Env = process.env): boolean {
  return readBool(env.WARDROBE_DEBUG, false);
}

/** Trace de debug, préfixée par module ; muette hors WARDROBE_DEBUG=true. */
export function debugLog(scope: string, ...args: unknown[]): void {
  if (isDebug()) console.debug(`[${scope}]`, ...args);
}
