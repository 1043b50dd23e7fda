export type * from './types/wardrobe';
export { COMPONENT_TYPES, HANDLE_STYLES, RAIL_TYPES, CLOTHING_TYPES, DOOR_TYPES, UNIT_SYSTEMS } from './types/wardrobe';
export * from './constants/app';

export * from './core/contracts/project';
export * from './core/components';
export * from './core/project';
export * from './core/library';

export * from './lib/units';
export * from './lib/geom';
export { loadConfig, type PlannerConfig } from './lib/env';
export { getAll as getMetrics, resetMetrics } from './lib/metrics';

export type * from './lib/io/schema';
export { projectToFile, projectFromFile, parseProjectJson, stringifyProject } from './lib/io/codec';
export { saveProjectFile, loadProjectFile, withProjectExtension, type SaveOutcome } from './lib/io/projectFile';

export { validateInsideFrame, validateNoOverlap, validateDrawerHeights, collectProblems } from './lib/layoutRules';
export { createComponentIndex, type ComponentIndex } from './lib/spatial/componentIndex';

export * from './lib/render/projection';
export * from './lib/render/surfaces';

export * from './state/projectStore';
