import type { ComponentType, Milli } from '@/types/wardrobe';
import type {
  BaseOptions,
  DrawerUnitOptions,
  HangingSpaceOptions,
  OverheadOptions,
  ShelfOptions,
} from '@/core/components/factories';

/** Champs spécifiques au variant, transmis tels quels à la factory. */
export type TemplateProperties = Omit<
  DrawerUnitOptions & HangingSpaceOptions & ShelfOptions & OverheadOptions,
  keyof BaseOptions
>;

export interface ComponentTemplate {
  name: string;
  description: string;
  componentType: ComponentType;
  width: Milli;
  height: Milli;
  depth: Milli;
  properties: TemplateProperties;
}

// ==================== PRESETS ====================
export const BUILTIN_TEMPLATES: readonly ComponentTemplate[] = [
  // Tiroirs
  {
    name: '4-Drawer Unit',
    description: 'Standard 4-drawer unit with bar handles',
    componentType: 'DRAWER_UNIT',
    width: 600,
    height: 800,
    depth: 500,
    properties: { drawerCount: 4, handleStyle: 'bar' },
  },
  {
    name: '3-Drawer Unit (Deep)',
    description: '3-drawer unit with deeper drawers',
    componentType: 'DRAWER_UNIT',
    width: 600,
    height: 750,
    depth: 500,
    properties: { drawerCount: 3, handleStyle: 'bar' },
  },
  {
    name: '5-Drawer Unit (Narrow)',
    description: 'Narrow 5-drawer unit for accessories',
    componentType: 'DRAWER_UNIT',
    width: 450,
    height: 750,
    depth: 500,
    properties: { drawerCount: 5, handleStyle: 'knob' },
  },
  // Penderies
  {
    name: 'Full-Length Hanging',
    description: 'Full-length hanging for coats and dresses',
    componentType: 'HANGING_SPACE',
    width: 800,
    height: 1800,
    depth: 580,
    properties: { railType: 'single', clothingType: 'full_length' },
  },
  {
    name: 'Double Hanging',
    description: 'Two rails for shirts and pants',
    componentType: 'HANGING_SPACE',
    width: 800,
    height: 1800,
    depth: 580,
    properties: { railType: 'double', clothingType: 'half_length' },
  },
  {
    name: 'Shirt Hanging',
    description: 'Single rail for shirts',
    componentType: 'HANGING_SPACE',
    width: 600,
    height: 1000,
    depth: 580,
    properties: { railType: 'single', clothingType: 'shirts' },
  },
  // Étagères
  {
    name: 'Standard Shelf',
    description: 'Standard adjustable shelf',
    componentType: 'SHELF',
    width: 800,
    height: 18,
    depth: 500,
    properties: { adjustable: true, shelfThickness: 18 },
  },
  {
    name: 'Wide Shelf',
    description: 'Wide shelf for folded items',
    componentType: 'SHELF',
    width: 1200,
    height: 18,
    depth: 500,
    properties: { adjustable: true, shelfThickness: 18 },
  },
  // Caissons hauts
  {
    name: 'Overhead Cabinet (2 Door)',
    description: 'Two-door overhead storage cabinet',
    componentType: 'OVERHEAD',
    width: 800,
    height: 400,
    depth: 580,
    properties: { doorType: 'hinged', doorCount: 2, hasShelf: true },
  },
  {
    name: 'Lift-Up Overhead',
    description: 'Overhead with lift-up door',
    componentType: 'OVERHEAD',
    width: 600,
    height: 350,
    depth: 580,
    properties: { doorType: 'lift_up', doorCount: 1, hasShelf: false },
  },
  {
    name: 'Wide Overhead (3 Door)',
    description: 'Three-door overhead cabinet',
    componentType: 'OVERHEAD',
    width: 1200,
    height: 400,
    depth: 580,
    properties: { doorType: 'hinged', doorCount: 3, hasShelf: true },
  },
];
