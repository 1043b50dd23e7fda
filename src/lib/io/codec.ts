/**
 * Project ↔ document JSON.
 *
 * Load runs three gates in order: structure (JSON, object), version membership,
 * then fields. Nothing is mutated until all three pass; the caller gets a fresh project.
 */

import type { Component, WardrobeProject } from '@/types/wardrobe';
import { UNIT_SYSTEMS } from '@/types/wardrobe';
import { DEFAULT_FRAME, DEFAULT_ZOOM_LEVEL } from '@/constants/app';
import { ErrorCode, fail, ok, type Result } from '@/core/contracts/project';
import { componentToRecord, readComponent } from '@/core/components/records';
import { createMetadata } from '@/core/project/frame';
import { RecordReader, isJsonObject } from './fields';
import { isSupportedVersion, type ProjectFileV1 } from './schema';

export function projectToFile(p: WardrobeProject): ProjectFileV1 {
  const m = p.metadata;
  return {
    version: p.version,
    metadata: {
      project_name: m.projectName,
      client_name: m.clientName,
      client_address: m.clientAddress,
      client_phone: m.clientPhone,
      notes: m.notes,
      created_date: m.createdDate,
      modified_date: m.modifiedDate,
    },
    unit_system: p.unitSystem,
    frame: {
      width: p.frame.width,
      height: p.frame.height,
      depth: p.frame.depth,
      panel_thickness: p.frame.panelThickness,
      top_clearance: p.frame.topClearance,
      base_height: p.frame.baseHeight,
    },
    components: p.components.map(componentToRecord),
    view_state: {
      zoom_level: p.zoomLevel,
      scroll_position: [p.scrollPosition[0], p.scrollPosition[1]],
    },
  };
}

export function projectFromFile(doc: unknown): Result<WardrobeProject> {
  if (!isJsonObject(doc)) {
    return fail(ErrorCode.InvalidFormat, 'Invalid file format: expected a JSON object');
  }

  const version = doc.version;
  if (version === undefined) {
    return fail(ErrorCode.MissingField, 'Missing required field: version', 'version');
  }
  if (!isSupportedVersion(version)) {
    return fail(ErrorCode.UnsupportedVersion, `Unsupported file version: ${String(version)}`, 'version');
  }

  const r = RecordReader.of(doc);

  const meta = r.optChild('metadata');
  const defaults = createMetadata();
  const metadata = {
    projectName: meta.optString('project_name', defaults.projectName),
    clientName: meta.optString('client_name', defaults.clientName),
    clientAddress: meta.optString('client_address', defaults.clientAddress),
    clientPhone: meta.optString('client_phone', defaults.clientPhone),
    notes: meta.optString('notes', defaults.notes),
    createdDate: meta.optString('created_date', defaults.createdDate),
    modifiedDate: meta.optString('modified_date', defaults.modifiedDate),
  };

  const unitSystem = r.optOneOf('unit_system', UNIT_SYSTEMS, 'METRIC');

  const fr = r.optChild('frame');
  const frame = {
    width: fr.optNumber('width', DEFAULT_FRAME.width),
    height: fr.optNumber('height', DEFAULT_FRAME.height),
    depth: fr.optNumber('depth', DEFAULT_FRAME.depth),
    panelThickness: fr.optNumber('panel_thickness', DEFAULT_FRAME.panelThickness),
    topClearance: fr.optNumber('top_clearance', DEFAULT_FRAME.topClearance),
    baseHeight: fr.optNumber('base_height', DEFAULT_FRAME.baseHeight),
  };

  const components: Component[] = [];
  for (const { item, path } of r.optArray('components')) {
    const cr = r.element(item, path);
    if (!cr) break;
    components.push(readComponent(cr));
    if (r.issue) break;
  }

  const view = r.optChild('view_state');
  const zoomLevel = view.optNumber('zoom_level', DEFAULT_ZOOM_LEVEL);
  const scroll = view.optNumberArray('scroll_position', [0, 0]);
  if (scroll.length !== 2) view.invalid('scroll_position', 'a pair of numbers');

  if (r.issue) return { ok: false, error: r.issue };

  return ok({
    version,
    metadata,
    unitSystem,
    frame,
    components,
    zoomLevel,
    scrollPosition: [scroll[0] ?? 0, scroll[1] ?? 0],
  });
}

export function parseProjectJson(text: string): Result<WardrobeProject> {
  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return fail(ErrorCode.InvalidFormat, `Invalid file format: ${reason}`);
  }
  return projectFromFile(doc);
}

export function stringifyProject(p: WardrobeProject): string {
  return JSON.stringify(projectToFile(p), null, 2);
}
