import { z } from 'zod';

export type TerrainId = 'grass' | 'road' | 'dirt' | 'water' | 'obstacle';

export interface LayoutCoordinate {
  row: number;
  col: number;
}

export interface GridLayout {
  id: string;
  name: string;
  description?: string;
  /** One string per row, one glyph per cell. */
  rows: string[];
  start?: LayoutCoordinate;
  end?: LayoutCoordinate;
}

export interface LayoutBundle {
  layouts: GridLayout[];
}

export const terrainByGlyph: Readonly<Record<string, TerrainId>> = {
  '.': 'grass',
  '=': 'road',
  ':': 'dirt',
  '~': 'water',
  '#': 'obstacle'
};

export const glyphByTerrain: Readonly<Record<TerrainId, string>> = {
  grass: '.',
  road: '=',
  dirt: ':',
  water: '~',
  obstacle: '#'
};

const layoutCoordinateSchema = z.object({
  row: z.number().int().nonnegative(),
  col: z.number().int().nonnegative()
});

const layoutSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    description: z.string().optional(),
    rows: z.array(z.string()).min(1),
    start: layoutCoordinateSchema.optional(),
    end: layoutCoordinateSchema.optional()
  })
  .superRefine((layout, ctx) => {
    const size = layout.rows.length;
    layout.rows.forEach((row, index) => {
      if (row.length !== size) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['rows', index],
          message: `Row ${index} has ${row.length} cells, expected ${size}`
        });
      }
      for (const glyph of row) {
        if (!(glyph in terrainByGlyph)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['rows', index],
            message: `Unknown terrain glyph '${glyph}'`
          });
        }
      }
    });

    for (const role of ['start', 'end'] as const) {
      const coordinate = layout[role];
      if (!coordinate) continue;
      if (coordinate.row >= size || coordinate.col >= size) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [role], message: `${role} lies outside the layout` });
      } else if (layout.rows[coordinate.row][coordinate.col] === '#') {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [role], message: `${role} sits on an obstacle` });
      }
    }

    if (layout.start && layout.end && layout.start.row === layout.end.row && layout.start.col === layout.end.col) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['end'], message: 'start and end share a cell' });
    }
  });

const layoutBundleSchema = z
  .object({
    layouts: z.array(layoutSchema)
  })
  .superRefine((bundle, ctx) => {
    const seen = new Set<string>();
    bundle.layouts.forEach((layout, index) => {
      if (seen.has(layout.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['layouts', index, 'id'], message: `Duplicate layout id ${layout.id}` });
      }
      seen.add(layout.id);
    });
  });

export function loadLayoutBundle(input: unknown): LayoutBundle {
  return layoutBundleSchema.parse(input);
}

export function layoutSize(layout: GridLayout): number {
  return layout.rows.length;
}

export function layoutTerrainAt(layout: GridLayout, coordinate: LayoutCoordinate): TerrainId {
  const glyph = layout.rows[coordinate.row]?.[coordinate.col];
  const terrain = glyph === undefined ? undefined : terrainByGlyph[glyph];
  if (!terrain) {
    throw new Error(`Layout ${layout.id} has no cell at ${coordinate.row},${coordinate.col}`);
  }
  return terrain;
}

export function findLayout(bundle: LayoutBundle, id: string): GridLayout | undefined {
  return bundle.layouts.find((layout) => layout.id === id);
}

export const starterLayouts: LayoutBundle = {
  layouts: [
    {
      id: 'open-field',
      name: 'Open Field',
      description: 'Plain grass from corner to corner.',
      rows: ['.....', '.....', '.....', '.....', '.....'],
      start: { row: 0, col: 0 },
      end: { row: 4, col: 4 }
    },
    {
      id: 'walled-row',
      name: 'Walled Row',
      description: 'A wall across the middle row separates start from end.',
      rows: ['.....', '.....', '#####', '.....', '.....'],
      start: { row: 0, col: 0 },
      end: { row: 4, col: 0 }
    },
    {
      id: 'river-crossing',
      name: 'River Crossing',
      description: 'A river with a single road bridge and some muddy banks.',
      rows: ['..::~...', '..::~...', '....~...', '....~...', '========', '....~...', '....~.##', '....~...'],
      start: { row: 7, col: 0 },
      end: { row: 0, col: 7 }
    },
    {
      id: 'spiral',
      name: 'Spiral',
      description: 'Walls wind inward toward the goal.',
      rows: [
        '..........',
        '.########.',
        '.#......#.',
        '.#.####.#.',
        '.#.#..#.#.',
        '.#.#.##.#.',
        '.#.#....#.',
        '.#.######.',
        '.#........',
        '.#########'
      ],
      start: { row: 0, col: 0 },
      end: { row: 4, col: 4 }
    }
  ]
};

export const validatedStarterLayouts = loadLayoutBundle(starterLayouts);
