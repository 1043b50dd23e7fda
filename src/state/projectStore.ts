import { createStore, type StoreApi } from 'zustand/vanilla';
import { current, isDraft, produce } from 'immer';
import type {
  Component,
  Dimensions,
  ID,
  Position,
  ProjectMetadata,
  UnitSystem,
  WardrobeFrame,
  WardrobeProject,
} from '@/types/wardrobe';
import { MAX_ZOOM_LEVEL, MIN_ZOOM_LEVEL, ZOOM_FACTOR } from '@/constants/app';
import type { Problem, Result } from '@/core/contracts/project';
import { atLeastOne } from '@/core/components/factories';
import { equalDrawerHeights, rescaleDrawerHeights } from '@/core/components/drawers';
import * as aggregate from '@/core/project/project';
import { clampFrame } from '@/core/project/frame';
import { createTemplateCatalog, type TemplateCatalog } from '@/core/library/catalog';
import type { TemplateProperties } from '@/core/library/templates';
import { clamp, snapToGrid } from '@/lib/geom';
import { loadConfig, type PlannerConfig } from '@/lib/env';
import { projectFromFile, projectToFile } from '@/lib/io/codec';
import type { ProjectFileV1 } from '@/lib/io/schema';
import { loadProjectFile, saveProjectFile, type SaveOutcome } from '@/lib/io/projectFile';
import { collectProblems } from '@/lib/layoutRules';
import { createComponentIndex } from '@/lib/spatial/componentIndex';

/** Part documentaire du projet, seule enregistrée dans l'historique (pas la vue). */
export type ProjectSnapshot = Pick<WardrobeProject, 'metadata' | 'unitSystem' | 'frame' | 'components'>;

export type ProjectUiState = {
  selectedId?: ID;
  snapToGrid: boolean;
  gridSizeMm: number;
  history: {
    past: ProjectSnapshot[];
    future: ProjectSnapshot[];
    limit: number;
  };
};

export type ProjectState = {
  project: WardrobeProject;
  ui: ProjectUiState;
};

/**
 * Champs éditables via le panneau de propriétés. Les champs de variant ne s'appliquent
 * qu'au variant qui les porte ; tiroirs : voir `setDrawerCount`.
 */
export type ComponentPatch = {
  name?: string;
  color?: string;
  label?: string;
  notes?: string;
  locked?: boolean;
  dimensions?: Partial<Dimensions>;
  position?: Partial<Position>;
} & Omit<TemplateProperties, 'drawerCount' | 'drawerHeights'>;

export type MetadataPatch = Partial<Omit<ProjectMetadata, 'createdDate' | 'modifiedDate'>>;

export type ProjectActions = {
  newProject: (opts?: aggregate.ProjectOptions) => void;
  addComponent: (c: Component) => void;
  addFromTemplate: (name: string, at?: Position) => Result<Component>;
  removeComponent: (id: ID) => Component | undefined;
  getComponent: (id: ID) => Component | undefined;
  selectComponent: (id: ID | undefined) => void;
  updateComponent: (id: ID, patch: ComponentPatch) => boolean;
  moveComponent: (id: ID, to: Position) => boolean;
  resizeComponent: (id: ID, dims: Partial<Dimensions>) => boolean;
  setDrawerCount: (id: ID, count: number) => boolean;
  setFrame: (patch: Partial<WardrobeFrame>) => void;
  setMetadata: (patch: MetadataPatch) => void;
  setUnitSystem: (unitSystem: UnitSystem) => void;
  setZoom: (zoom: number) => void;
  zoomIn: (factor?: number) => boolean;
  zoomOut: (factor?: number) => boolean;
  setScroll: (x: number, y: number) => void;
  setSnapToGrid: (on: boolean) => void;
  undo: () => void;
  redo: () => void;
  toFile: () => ProjectFileV1;
  loadFromFile: (doc: unknown) => Result<WardrobeProject>;
  openFile: (path: string) => Result<WardrobeProject>;
  saveFile: (path: string) => Result<SaveOutcome>;
  hitTest: (point: Position) => ID | undefined;
  problems: () => Problem[];
};

export type ProjectStore = ProjectState & ProjectActions;

export type ProjectStoreOptions = {
  catalog?: TemplateCatalog;
  config?: PlannerConfig;
};

// Helper: snapshot of the document part (plain copy of the draft)
function takeSnapshot(draft: ProjectState): ProjectSnapshot {
  const p = current(draft.project);
  return { metadata: p.metadata, unitSystem: p.unitSystem, frame: p.frame, components: p.components };
}

// Helper: restore snapshot
function applySnapshot(draft: ProjectState, snap: ProjectSnapshot): void {
  draft.project.metadata = snap.metadata;
  draft.project.unitSystem = snap.unitSystem;
  draft.project.frame = snap.frame;
  draft.project.components = snap.components;
  const selected = draft.ui.selectedId;
  if (selected !== undefined && !snap.components.some((c) => c.id === selected)) {
    draft.ui.selectedId = undefined;
  }
}

// Helper: push to history with FIFO limit
function pushHistory(draft: ProjectState, snap: ProjectSnapshot): void {
  draft.ui.history.past.push(snap);
  if (draft.ui.history.past.length > draft.ui.history.limit) {
    draft.ui.history.past.shift(); // FIFO drop
  }
  draft.ui.history.future = []; // Clear future on new action
}

function findDraft(draft: ProjectState, id: ID): Component | undefined {
  return draft.project.components.find((c) => c.id === id);
}

function applyPatch(c: Component, patch: ComponentPatch): void {
  if (patch.name !== undefined) c.name = patch.name;
  if ('color' in patch) c.color = patch.color;
  if ('label' in patch) c.label = patch.label;
  if ('notes' in patch) c.notes = patch.notes;
  if (patch.locked !== undefined) c.locked = patch.locked;
  if (patch.dimensions) Object.assign(c.dimensions, patch.dimensions);
  if (patch.position) Object.assign(c.position, patch.position);

  switch (c.componentType) {
    case 'DRAWER_UNIT':
      if (patch.handleStyle !== undefined) c.handleStyle = patch.handleStyle;
      break;
    case 'HANGING_SPACE':
      if (patch.railHeight !== undefined) c.railHeight = patch.railHeight;
      if (patch.railType !== undefined) c.railType = patch.railType;
      if (patch.clothingType !== undefined) c.clothingType = patch.clothingType;
      break;
    case 'SHELF':
      if (patch.adjustable !== undefined) c.adjustable = patch.adjustable;
      if (patch.shelfThickness !== undefined) c.shelfThickness = patch.shelfThickness;
      if (patch.loadCapacity !== undefined) c.loadCapacity = patch.loadCapacity;
      break;
    case 'OVERHEAD':
      if (patch.doorType !== undefined) c.doorType = patch.doorType;
      if (patch.doorCount !== undefined) c.doorCount = atLeastOne(patch.doorCount);
      if (patch.hasShelf !== undefined) c.hasShelf = patch.hasShelf;
      break;
    case 'FRAME':
    case 'DIVIDER':
    case 'UNKNOWN':
      break;
  }
}

function initialState(config: PlannerConfig, project: WardrobeProject = aggregate.createProject()): ProjectState {
  return {
    project,
    ui: {
      selectedId: undefined,
      snapToGrid: config.snapToGrid,
      gridSizeMm: config.gridSizeMm,
      history: { past: [], future: [], limit: config.historyLimit },
    },
  };
}

/**
 * Store projet : unique écrivain du modèle. Toute mutation passe par immer ;
 * chaque mutation documentaire empile un snapshot (undo borné, FIFO).
 */
export function createProjectStore(options: ProjectStoreOptions = {}): StoreApi<ProjectStore> {
  const catalog = options.catalog ?? createTemplateCatalog();
  const config = options.config ?? loadConfig();

  return createStore<ProjectStore>()((set, get) => {
    /** Mutation enregistrée : `recipe` renvoie false s'il n'a rien modifié. */
    function commit(recipe: (draft: ProjectState) => boolean): boolean {
      let applied = false;
      set(
        produce((draft: ProjectStore) => {
          const snap = takeSnapshot(draft);
          applied = recipe(draft);
          if (applied) pushHistory(draft, snap);
        })
      );
      return applied;
    }

    function snapPosition(p: Position): Position {
      const { snapToGrid: on, gridSizeMm } = get().ui;
      return on ? { x: snapToGrid(p.x, gridSizeMm), y: snapToGrid(p.y, gridSizeMm) } : { ...p };
    }

    /** Zoom par facteur ; refusé (sans borner) si le résultat sort des limites. */
    function stepZoom(next: number): boolean {
      if (next < MIN_ZOOM_LEVEL || next > MAX_ZOOM_LEVEL) return false;
      set(
        produce((draft: ProjectStore) => {
          draft.project.zoomLevel = next;
        })
      );
      return true;
    }

    function replaceProject(project: WardrobeProject): void {
      set(
        produce((draft: ProjectStore) => {
          draft.project = project;
          draft.ui.selectedId = undefined;
          draft.ui.history.past = [];
          draft.ui.history.future = [];
        })
      );
    }

    return {
      ...initialState(config),

      newProject: (opts) => replaceProject(aggregate.createProject(opts)),

      addComponent: (c) => {
        commit((draft) => {
          aggregate.addComponent(draft.project, c);
          return true;
        });
      },

      addFromTemplate: (name, at) => {
        const res = catalog.createComponent(name);
        if (!res.ok) return res;
        const component = res.value;
        if (at) component.position = snapPosition(at);
        commit((draft) => {
          aggregate.addComponent(draft.project, component);
          draft.ui.selectedId = component.id;
          return true;
        });
        return res;
      },

      removeComponent: (id) => {
        let removed: Component | undefined;
        commit((draft) => {
          const found = aggregate.removeComponent(draft.project, id);
          if (!found) return false;
          removed = isDraft(found) ? current(found) : found;
          if (draft.ui.selectedId === id) draft.ui.selectedId = undefined;
          return true;
        });
        return removed;
      },

      getComponent: (id) => aggregate.getComponent(get().project, id),

      selectComponent: (id) =>
        set(
          produce((draft: ProjectStore) => {
            draft.ui.selectedId = id !== undefined && findDraft(draft, id) ? id : undefined;
          })
        ),

      updateComponent: (id, patch) =>
        commit((draft) => {
          const c = findDraft(draft, id);
          if (!c) return false;
          applyPatch(c, patch);
          return true;
        }),

      moveComponent: (id, to) => {
        const target = snapPosition(to);
        return commit((draft) => {
          const c = findDraft(draft, id);
          if (!c || c.locked) return false;
          if (c.position.x === target.x && c.position.y === target.y) return false;
          c.position = target;
          return true;
        });
      },

      resizeComponent: (id, dims) =>
        commit((draft) => {
          const c = findDraft(draft, id);
          if (!c) return false;
          const oldHeight = c.dimensions.height;
          Object.assign(c.dimensions, dims);
          if (c.componentType === 'DRAWER_UNIT' && c.dimensions.height !== oldHeight) {
            c.drawerHeights = rescaleDrawerHeights(c.drawerHeights, c.dimensions.height);
          }
          return true;
        }),

      setDrawerCount: (id, count) =>
        commit((draft) => {
          const c = findDraft(draft, id);
          if (!c || c.componentType !== 'DRAWER_UNIT') return false;
          c.drawerCount = atLeastOne(count);
          c.drawerHeights = equalDrawerHeights(c.dimensions.height, c.drawerCount);
          return true;
        }),

      setFrame: (patch) => {
        commit((draft) => {
          draft.project.frame = clampFrame({ ...draft.project.frame, ...patch });
          return true;
        });
      },

      setMetadata: (patch) => {
        commit((draft) => {
          Object.assign(draft.project.metadata, patch);
          return true;
        });
      },

      setUnitSystem: (unitSystem) => {
        commit((draft) => {
          if (draft.project.unitSystem === unitSystem) return false;
          draft.project.unitSystem = unitSystem;
          return true;
        });
      },

      // Vue : hors historique
      setZoom: (zoom) =>
        set(
          produce((draft: ProjectStore) => {
            draft.project.zoomLevel = clamp(zoom, MIN_ZOOM_LEVEL, MAX_ZOOM_LEVEL);
          })
        ),

      zoomIn: (factor = ZOOM_FACTOR) => stepZoom(get().project.zoomLevel * factor),

      zoomOut: (factor = ZOOM_FACTOR) => stepZoom(get().project.zoomLevel / factor),

      setScroll: (x, y) =>
        set(
          produce((draft: ProjectStore) => {
            draft.project.scrollPosition = [x, y];
          })
        ),

      setSnapToGrid: (on) =>
        set(
          produce((draft: ProjectStore) => {
            draft.ui.snapToGrid = on;
          })
        ),

      undo: () =>
        set(
          produce((draft: ProjectStore) => {
            const prevSnap = draft.ui.history.past.pop();
            if (!prevSnap) return;
            draft.ui.history.future.push(takeSnapshot(draft));
            applySnapshot(draft, prevSnap);
          })
        ),

      redo: () =>
        set(
          produce((draft: ProjectStore) => {
            const nextSnap = draft.ui.history.future.pop();
            if (!nextSnap) return;
            draft.ui.history.past.push(takeSnapshot(draft));
            applySnapshot(draft, nextSnap);
          })
        ),

      toFile: () => projectToFile(get().project),

      loadFromFile: (doc) => {
        const res = projectFromFile(doc);
        if (res.ok) replaceProject(res.value);
        return res;
      },

      openFile: (path) => {
        const res = loadProjectFile(path);
        if (res.ok) replaceProject(res.value);
        return res;
      },

      saveFile: (path) => {
        const res = saveProjectFile(get().project, path);
        if (res.ok) {
          const { modifiedDate } = res.value;
          set(
            produce((draft: ProjectStore) => {
              draft.project.metadata.modifiedDate = modifiedDate;
            })
          );
        }
        return res;
      },

      hitTest: (point) => createComponentIndex(get().project.components).topmostAt(point.x, point.y),

      problems: () => collectProblems(get().project),
    };
  });
}
