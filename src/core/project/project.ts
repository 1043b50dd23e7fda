import type {
  Component,
  ID,
  ProjectMetadata,
  UnitSystem,
  WardrobeFrame,
  WardrobeProject,
} from '@/types/wardrobe';
import { CURRENT_FILE_VERSION, DEFAULT_ZOOM_LEVEL } from '@/constants/app';
import { createFrame, createMetadata } from './frame';

export type ProjectOptions = {
  metadata?: Partial<ProjectMetadata>;
  unitSystem?: UnitSystem;
  frame?: Partial<WardrobeFrame>;
  components?: Component[];
  zoomLevel?: number;
  scrollPosition?: [number, number];
};

export function createProject(opts: ProjectOptions = {}): WardrobeProject {
  return {
    version: CURRENT_FILE_VERSION,
    metadata: createMetadata(opts.metadata),
    unitSystem: opts.unitSystem ?? 'METRIC',
    frame: createFrame(opts.frame),
    components: opts.components ? [...opts.components] : [],
    zoomLevel: opts.zoomLevel ?? DEFAULT_ZOOM_LEVEL,
    scrollPosition: opts.scrollPosition ?? [0, 0],
  };
}

export function touch(project: WardrobeProject, now: Date = new Date()): void {
  project.metadata.modifiedDate = now.toISOString();
}

/**
 * Ajoute en fin de liste (= au-dessus dans l'ordre z). Pas de contrôle d'unicité :
 * les ids viennent des factories.
 */
export function addComponent(project: WardrobeProject, component: Component): void {
  project.components.push(component);
  touch(project);
}

/** Retire la première occurrence de l'id ; sans effet (ni horodatage) si absent. */
export function removeComponent(project: WardrobeProject, id: ID): Component | undefined {
  const idx = project.components.findIndex((c) => c.id === id);
  if (idx < 0) return undefined;
  const [removed] = project.components.splice(idx, 1);
  touch(project);
  return removed;
}

export function getComponent(project: WardrobeProject, id: ID): Component | undefined {
  return project.components.find((c) => c.id === id);
}
