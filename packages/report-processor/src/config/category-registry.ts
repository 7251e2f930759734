import type { HeaderSignature, StyledCategory } from '../types';

import { isEqual } from 'es-toolkit';

import { ReportProcessingError } from '../errors/report-processing-error';
import { TABLE_CATEGORIES } from '../types';

/**
 * Colors applied to a table of one category (hex, no '#')
 */
export interface CategoryStyle {
  headerFill: string;
  headerFont: string;
  contentFill1: string;
  contentFill2: string;
  contentFont: string;
}

/**
 * Positional header check: `length` header cells, the ones at `emptyAt`
 * (zero-based) blank
 */
export interface ShapeSpec {
  length: number;
  emptyAt: number[];
}

/**
 * Declarative header matching rules of a category.
 * A header matches when any exact sequence or any shape matches.
 */
export interface MatchSpec {
  /**
   * Literal header sequences compared against `HeaderSignature.texts`
   */
  exact: string[][];

  /**
   * Shape heuristics evaluated against `HeaderSignature.cells`
   */
  shapes: ShapeSpec[];
}

export interface CategoryDefinition {
  category: StyledCategory;
  match: MatchSpec;
  style: CategoryStyle;
}

export type HeaderPredicate = (signature: HeaderSignature) => boolean;

export interface CategoryRegistryEntry {
  readonly category: StyledCategory;
  readonly matches: HeaderPredicate;
  readonly style: Readonly<CategoryStyle>;
  readonly definition: Readonly<CategoryDefinition>;
}

/**
 * Built-in categories in classification priority order
 */
export const DEFAULT_CATEGORY_DEFINITIONS: readonly CategoryDefinition[] = [
  {
    category: 'azure',
    match: {
      exact: [
        ['Failing Controls - UGC', 'Failing Controls - ZenPay'],
        ['Control States:', 'UGC', 'ZenPay'],
        ['Resource States:', 'UGC', 'ZenPay'],
      ],
      shapes: [{ length: 6, emptyAt: [3] }],
    },
    style: {
      headerFill: '5B9BD5',
      headerFont: 'FFFFFF',
      contentFill1: 'DEEBF7',
      contentFill2: 'BDD7EE',
      contentFont: '000000',
    },
  },
  {
    category: 'wpengine',
    match: {
      exact: [
        [
          'Plugins updated',
          'Domains secured',
          'Platform enhancements',
          'Attacks blocked',
        ],
      ],
      shapes: [],
    },
    style: {
      headerFill: 'A9D18E',
      headerFont: 'FFFFFF',
      contentFill1: 'E2EFD9',
      contentFill2: 'C5E0B3',
      contentFont: '000000',
    },
  },
  {
    category: 'cisco',
    match: {
      exact: [
        [
          'Total Data Transferred',
          'Total Data - DOWNLOADED',
          'Total Data - UPLOADED',
          'Total Unique Clients',
          'Average of clients per day',
          'Average usage per client',
        ],
        [
          'Top clients by usage',
          'Usage',
          'Usage',
          'Top Blocked Sites by URL',
          'Category',
          'Sites',
        ],
      ],
      shapes: [],
    },
    style: {
      headerFill: 'FFC000',
      headerFont: 'FFFFFF',
      contentFill1: 'FFF2CC',
      contentFill2: 'FFE699',
      contentFont: '000000',
    },
  },
  {
    category: 'barracuda',
    match: {
      exact: [
        [
          'Emails Scanned',
          'Emails Blocked',
          'Emails Quarantined',
          'Emails Delivered',
        ],
        ['Top Threat Types', 'Count'],
      ],
      shapes: [],
    },
    style: {
      headerFill: 'ED7D31',
      headerFont: 'FFFFFF',
      contentFill1: 'FBE4D5',
      contentFill2: 'F8CBAD',
      contentFont: '000000',
    },
  },
  {
    category: 'websites',
    match: {
      exact: [['Website', 'Uptime', 'Average Response Time', 'SSL Expiry']],
      shapes: [],
    },
    style: {
      headerFill: '7030A0',
      headerFont: 'FFFFFF',
      contentFill1: 'E4DFEC',
      contentFill2: 'CCC0DA',
      contentFont: '000000',
    },
  },
  {
    category: 'summary',
    match: {
      exact: [['Business', 'Category', 'Item', 'Notes', 'Status']],
      shapes: [],
    },
    style: {
      headerFill: '404040',
      headerFont: 'FFFFFF',
      contentFill1: 'F2F2F2',
      contentFill2: 'D9D9D9',
      contentFont: '000000',
    },
  },
];

/**
 * Compile a MatchSpec into a predicate that never throws on well-typed input.
 * A shape does not match a header whose texts equal one of `excluded`
 * (the literal headers of other categories).
 */
export function createHeaderPredicate(
  spec: MatchSpec,
  excluded: readonly (readonly string[])[] = [],
): HeaderPredicate {
  const exact = spec.exact.map((sequence) => [...sequence]);
  const shapes = spec.shapes.map((shape) => ({
    length: shape.length,
    emptyAt: [...shape.emptyAt],
  }));
  const excludedTexts = excluded.map((sequence) => [...sequence]);

  return (signature) => {
    if (exact.some((sequence) => isEqual(sequence, signature.texts))) {
      return true;
    }
    const matchesShape = shapes.some(
      (shape) =>
        signature.cells.length === shape.length &&
        shape.emptyAt.every((position) => signature.cells[position] === ''),
    );
    return (
      matchesShape &&
      !excludedTexts.some((sequence) => isEqual(sequence, signature.texts))
    );
  };
}

/**
 * Header cells of `texts` laid out in `shape`: blanks at `emptyAt`, the texts
 * in order everywhere else. Null when the counts do not add up.
 */
export function layoutInShape(
  texts: readonly string[],
  shape: ShapeSpec,
): string[] | null {
  const blanks = new Set(
    shape.emptyAt.filter((position) => position < shape.length),
  );
  if (blanks.size + texts.length !== shape.length) {
    return null;
  }

  const cells: string[] = [];
  let next = 0;
  for (let position = 0; position < shape.length; position++) {
    if (blanks.has(position)) {
      cells.push('');
    } else {
      cells.push(texts[next]);
      next++;
    }
  }
  return cells;
}

/**
 * CategoryRegistry
 *
 * Immutable, ordered list of `(predicate, style)` pairs. Classification walks
 * the entries in order and the first matching predicate wins, so entries
 * are always kept in `TABLE_CATEGORIES` priority order regardless of the
 * order definitions are given in.
 *
 * Shapes never claim a header whose texts are another category's literal
 * header, so a summary row with a blank column is not taken by an Azure shape.
 *
 * @throws {ReportProcessingError} When a category is defined twice, when a
 * literal header of one category (as is, or laid out in any shape) is also
 * matched by another category, or when two categories share a shape length
 */
export class CategoryRegistry {
  readonly entries: readonly CategoryRegistryEntry[];
  private readonly styles: ReadonlyMap<StyledCategory, Readonly<CategoryStyle>>;

  constructor(definitions: readonly CategoryDefinition[]) {
    const seen = new Set<StyledCategory>();
    for (const definition of definitions) {
      if (seen.has(definition.category)) {
        throw new ReportProcessingError(
          `Category "${definition.category}" is defined more than once`,
        );
      }
      seen.add(definition.category);
    }

    const ordered = [...definitions].sort(
      (a, b) =>
        TABLE_CATEGORIES.indexOf(a.category) -
        TABLE_CATEGORIES.indexOf(b.category),
    );

    this.entries = Object.freeze(
      ordered.map((definition) =>
        Object.freeze({
          category: definition.category,
          matches: createHeaderPredicate(
            definition.match,
            ordered
              .filter((other) => other.category !== definition.category)
              .flatMap((other) => other.match.exact),
          ),
          style: Object.freeze({ ...definition.style }),
          definition: Object.freeze({ ...definition }),
        }),
      ),
    );
    this.styles = new Map(
      this.entries.map((entry) => [entry.category, entry.style]),
    );

    this.assertDisjoint();
  }

  /**
   * Registry built from the compiled-in definitions
   */
  static createDefault(): CategoryRegistry {
    return new CategoryRegistry(DEFAULT_CATEGORY_DEFINITIONS);
  }

  getStyle(category: StyledCategory): Readonly<CategoryStyle> | undefined {
    return this.styles.get(category);
  }

  get categories(): StyledCategory[] {
    return this.entries.map((entry) => entry.category);
  }

  private assertDisjoint(): void {
    const shapes = this.entries.flatMap((entry) =>
      entry.definition.match.shapes.map((shape) => ({
        category: entry.category,
        shape,
      })),
    );

    for (const entry of this.entries) {
      for (const sequence of entry.definition.match.exact) {
        const layouts = shapes
          .map(({ shape }) => layoutInShape(sequence, shape))
          .filter((cells): cells is string[] => cells !== null);

        for (const cells of [sequence, ...layouts]) {
          const signature: HeaderSignature = { texts: sequence, cells };
          const other = this.entries.find(
            (candidate) =>
              candidate.category !== entry.category &&
              candidate.matches(signature),
          );
          if (other) {
            throw new ReportProcessingError(
              `Header [${cells.join(', ')}] of "${entry.category}" is also matched by "${other.category}"`,
            );
          }
        }
      }
    }

    for (const [index, first] of shapes.entries()) {
      const clash = shapes
        .slice(index + 1)
        .find(
          (second) =>
            second.category !== first.category &&
            second.shape.length === first.shape.length,
        );
      if (clash) {
        throw new ReportProcessingError(
          `Shapes of length ${first.shape.length} are defined by both "${first.category}" and "${clash.category}"`,
        );
      }
    }
  }
}
