import type { Component, ComponentType } from '@/types/wardrobe';
import { ErrorCode, fail, ok, type Result } from '@/core/contracts/project';
import {
  createDrawerUnit,
  createHangingSpace,
  createOverhead,
  createShelf,
} from '@/core/components/factories';
import { BUILTIN_TEMPLATES, type ComponentTemplate } from './templates';

/**
 * Instancie un composant neuf (id frais) à partir d'un template.
 * Seuls les quatre variants ont une factory ; FRAME / DIVIDER → UnknownComponentType.
 */
export function createComponentFromTemplate(t: ComponentTemplate): Result<Component> {
  const opts = { ...t.properties, width: t.width, height: t.height, depth: t.depth };
  switch (t.componentType) {
    case 'DRAWER_UNIT':
      return ok(createDrawerUnit(t.name, opts));
    case 'HANGING_SPACE':
      return ok(createHangingSpace(t.name, opts));
    case 'SHELF':
      return ok(createShelf(t.name, opts));
    case 'OVERHEAD':
      return ok(createOverhead(t.name, opts));
    case 'FRAME':
    case 'DIVIDER':
      return fail(ErrorCode.UnknownComponentType, `Unknown component type: ${t.componentType}`);
  }
}

export interface TemplateCatalog {
  get(name: string): ComponentTemplate | undefined;
  byType(type: ComponentType): ComponentTemplate[];
  all(): ComponentTemplate[];
  names(): string[];
  createComponent(nameOrTemplate: string | ComponentTemplate): Result<Component>;
}

// Copie profonde : les templates ne portent qu'un niveau d'objets plus un tableau optionnel
function cloneTemplate(t: ComponentTemplate): ComponentTemplate {
  const { drawerHeights, ...rest } = t.properties;
  return { ...t, properties: drawerHeights ? { ...rest, drawerHeights: [...drawerHeights] } : rest };
}

/**
 * Registre en lecture seule, construit une fois puis injecté (store, shell).
 * Les templates sont copiés à la construction et à chaque lecture : modifier une entrée
 * rendue ne touche ni le registre ni `BUILTIN_TEMPLATES`.
 * Ordre d'insertion conservé ; un nom en double remplace l'entrée précédente à sa place.
 */
export function createTemplateCatalog(
  templates: readonly ComponentTemplate[] = BUILTIN_TEMPLATES
): TemplateCatalog {
  const byName = new Map<string, ComponentTemplate>();
  for (const t of templates) byName.set(t.name, cloneTemplate(t));

  return {
    get: (name) => {
      const t = byName.get(name);
      return t && cloneTemplate(t);
    },
    byType: (type) => [...byName.values()].filter((t) => t.componentType === type).map(cloneTemplate),
    all: () => [...byName.values()].map(cloneTemplate),
    names: () => [...byName.keys()],
    createComponent(nameOrTemplate) {
      const t = typeof nameOrTemplate === 'string' ? byName.get(nameOrTemplate) : nameOrTemplate;
      if (!t) {
        return fail(ErrorCode.UnknownComponentType, `Unknown template: ${String(nameOrTemplate)}`);
      }
      return createComponentFromTemplate(t);
    },
  };
}
