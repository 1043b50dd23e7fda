/**
 * Project files on disk (`.wdp`, UTF-8 JSON).
 * Synchronous: the shell calls these from a save/open command and waits for the result.
 */

import { copyFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, extname } from 'node:path';
import type { WardrobeProject } from '@/types/wardrobe';
import { BACKUP_SUFFIX, FILE_EXTENSION } from '@/constants/app';
import { ErrorCode, fail, ok, type Result } from '@/core/contracts/project';
import { incFileOp, setComponentCount } from '@/lib/metrics';
import { debugLog } from '@/lib/env';
import { parseProjectJson, stringifyProject } from './codec';

export type SaveOutcome = { path: string; message: string; modifiedDate: string };

/** Remplace (ou ajoute) l'extension projet. */
export function withProjectExtension(path: string): string {
  const ext = extname(path);
  if (ext.toLowerCase() === FILE_EXTENSION) return path;
  return (ext ? path.slice(0, -ext.length) : path) + FILE_EXTENSION;
}

function errnoCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Écrit le projet. Un fichier existant est d'abord copié tel quel vers `<path>.bak`.
 * Le projet reçu n'est pas modifié : une copie horodatée est sérialisée, et la date
 * écrite revient dans `modifiedDate` pour que l'appelant l'applique.
 */
export function saveProjectFile(project: WardrobeProject, path: string): Result<SaveOutcome> {
  const target = withProjectExtension(path);
  const modifiedDate = new Date().toISOString();
  const stamped: WardrobeProject = { ...project, metadata: { ...project.metadata, modifiedDate } };
  try {
    if (existsSync(target)) {
      copyFileSync(target, target + BACKUP_SUFFIX);
      debugLog('projectFile', `backup written to ${target}${BACKUP_SUFFIX}`);
    }
    const json = stringifyProject(stamped);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, json, 'utf-8');
  } catch (err) {
    const code = errnoCode(err);
    if (code === 'EACCES' || code === 'EPERM') {
      console.error('[projectFile] save denied:', target);
      incFileOp('save', ErrorCode.PermissionDenied);
      return fail(ErrorCode.PermissionDenied, `Permission denied: Cannot write to ${target}`, target);
    }
    console.error('[projectFile] save failed:', err);
    incFileOp('save', ErrorCode.WriteFailed);
    return fail(ErrorCode.WriteFailed, `Failed to save project: ${reasonOf(err)}`, target);
  }

  incFileOp('save', 'ok');
  setComponentCount(project.components.length);
  return ok({ path: target, message: `Project saved to ${target}`, modifiedDate });
}

export function loadProjectFile(path: string): Result<WardrobeProject> {
  if (!existsSync(path)) {
    incFileOp('load', ErrorCode.NotFound);
    return fail(ErrorCode.NotFound, `File not found: ${path}`, path);
  }

  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    const code = errnoCode(err);
    const errorCode = code === 'EACCES' || code === 'EPERM' ? ErrorCode.PermissionDenied : ErrorCode.InvalidFormat;
    console.error('[projectFile] read failed:', err);
    incFileOp('load', errorCode);
    return fail(errorCode, `Failed to load project: ${reasonOf(err)}`, path);
  }

  const res = parseProjectJson(text);
  if (!res.ok) {
    console.warn(`[projectFile] load rejected (${res.error.code}): ${res.error.message}`);
    incFileOp('load', res.error.code);
    return res;
  }

  incFileOp('load', 'ok');
  setComponentCount(res.value.components.length);
  return res;
}
