import RBush from 'rbush';
import type { Component, ID, Rect } from '@/types/wardrobe';

type Node = { minX: number; minY: number; maxX: number; maxY: number; id: ID; z: number };

/** Rectangle modèle (bas-gauche, Y vers le haut) d'un composant. */
export function componentRect(c: Component): Rect {
  return { x: c.position.x, y: c.position.y, w: c.dimensions.width, h: c.dimensions.height };
}

function nodeOf(c: Component, z: number): Node {
  const { x, y, w, h } = componentRect(c);
  return { minX: x, minY: y, maxX: x + w, maxY: y + h, id: c.id, z };
}

export interface ComponentIndex {
  /** Ids dont la boîte touche `rect` (bords inclus), triés par ordre z croissant. */
  search(rect: Rect): ID[];
  /** Composant le plus haut dans l'ordre z contenant le point, bords inclus. */
  topmostAt(x: number, y: number): ID | undefined;
  /** Voisins potentiels d'un composant (hors lui-même). */
  neighbors(id: ID): ID[];
  size(): number;
}

/**
 * Index R-tree construit en une fois sur la liste (bulk load).
 * Le projet est petit et muté par snapshots : on reconstruit plutôt que de maintenir.
 */
export function createComponentIndex(components: readonly Component[]): ComponentIndex {
  const tree = new RBush<Node>();
  const nodes = new Map<ID, Node>();
  const items = components.map((c, z) => nodeOf(c, z));
  items.forEach((n) => nodes.set(n.id, n));
  tree.load(items);

  function query(b: { minX: number; minY: number; maxX: number; maxY: number }): Node[] {
    return tree.search(b).sort((a, c) => a.z - c.z);
  }

  return {
    search(r) {
      return query({ minX: r.x, minY: r.y, maxX: r.x + r.w, maxY: r.y + r.h }).map((n) => n.id);
    },
    topmostAt(x, y) {
      const hits = query({ minX: x, minY: y, maxX: x, maxY: y });
      return hits.length > 0 ? hits[hits.length - 1].id : undefined;
    },
    neighbors(id) {
      const n = nodes.get(id);
      if (!n) return [];
      return query(n)
        .filter((other) => other.id !== id)
        .map((other) => other.id);
    },
    size: () => nodes.size,
  };
}
