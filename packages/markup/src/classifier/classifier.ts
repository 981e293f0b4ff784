import { type ComponentLibrary, defaultLibrary, segmentTarget } from '../components/library.js';
import type { KeywordToken, OptionBlockToken, PathOpToken, Token } from '../lexer/token.js';
import { NODE_COMMANDS, PATH_COMMANDS, PathOperator, TokenType } from '../lexer/token-types.js';

export const StatementKind = {
  STANDALONE_NODE: 'StandaloneNode',
  SIMPLE_WIRE: 'SimpleWire',
  MULTI_SEGMENT_PATH: 'MultiSegmentPath',
  COMPONENT_ON_PATH: 'ComponentOnPath',
  GROUP_OPEN: 'GroupOpen',
  GROUP_CLOSE: 'GroupClose',
  UNRECOGNIZED: 'Unrecognized',
} as const;

export type StatementKind = (typeof StatementKind)[keyof typeof StatementKind];

export interface Classification {
  kind: StatementKind;
  /** Name of the rule that matched */
  rule: string;
  /** Why the statement was not recognized */
  reason?: string;
}

/** Bare words the editor dialect uses inside statements */
const DIALECT_WORDS: ReadonlySet<string> = new Set(['node', 'at', 'cycle', 'coordinate']);

const GROUP_ENVIRONMENT = 'scope';

/**
 * Facts about a statement that the rules match against
 */
export interface StatementShape {
  tokens: Token[];
  head: KeywordToken | null;
  operators: PathOpToken[];
  /** Path points, excluding node names and `at` positions */
  pointCount: number;
  /** Bare words after the head */
  words: KeywordToken[];
  library: ComponentLibrary;
}

export interface ClassificationRule {
  name: string;
  match(shape: StatementShape): Omit<Classification, 'rule'> | null;
}

function isPathCommand(shape: StatementShape): boolean {
  return shape.head !== null && PATH_COMMANDS.has(shape.head.keyword);
}

/**
 * Option block following a `to` operator, if any
 */
function toOptions(shape: StatementShape, operator: PathOpToken): OptionBlockToken | null {
  const next = shape.tokens[shape.tokens.indexOf(operator) + 1];
  return next !== undefined && next.type === TokenType.OPTION_BLOCK ? next : null;
}

function unrecognized(reason: string): Omit<Classification, 'rule'> {
  return { kind: StatementKind.UNRECOGNIZED, reason };
}

/**
 * Classification rules, highest priority first. The first rule that returns
 * a result decides the statement kind.
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    name: 'group-open',
    match: ({ head }) =>
      head?.keyword === '\\begin' && head.environment === GROUP_ENVIRONMENT
        ? { kind: StatementKind.GROUP_OPEN }
        : null,
  },
  {
    name: 'group-close',
    match: ({ head }) =>
      head?.keyword === '\\end' && head.environment === GROUP_ENVIRONMENT
        ? { kind: StatementKind.GROUP_CLOSE }
        : null,
  },
  {
    name: 'unsupported-command',
    match: ({ head, tokens }) => {
      if (head === null) {
        return unrecognized(`Statement does not start with a command: '${tokens[0]?.value ?? ''}'`);
      }
      if (head.environment !== null) {
        return unrecognized(`Unsupported environment '${head.environment}'`);
      }
      if (!PATH_COMMANDS.has(head.keyword) && !NODE_COMMANDS.has(head.keyword)) {
        return unrecognized(`Unsupported command '${head.keyword}'`);
      }
      return null;
    },
  },
  {
    name: 'unsupported-construct',
    match: ({ words }) => {
      const foreign = words.find((word) => !DIALECT_WORDS.has(word.keyword));
      return foreign ? unrecognized(`Unsupported construct '${foreign.keyword}'`) : null;
    },
  },
  {
    name: 'node-command',
    match: ({ head, operators }) => {
      if (head === null || !NODE_COMMANDS.has(head.keyword)) return null;
      if (operators.length > 0) {
        return unrecognized(`Path operator '${operators[0].operator}' in a ${head.keyword} statement`);
      }
      return { kind: StatementKind.STANDALONE_NODE };
    },
  },
  {
    name: 'unknown-component',
    match: (shape) => {
      for (const operator of shape.operators) {
        if (operator.operator !== PathOperator.TO) continue;
        const block = toOptions(shape, operator);
        if (block === null) continue;
        const target = segmentTarget(block.options, shape.library);
        if (target.kind === 'unknown') {
          return unrecognized(target.reason);
        }
      }
      return null;
    },
  },
  {
    name: 'component-on-path',
    match: (shape) => {
      if (shape.operators.length !== 1) return null;
      const [operator] = shape.operators;
      if (operator.operator !== PathOperator.TO) return null;
      const block = toOptions(shape, operator);
      if (block === null) return null;
      return segmentTarget(block.options, shape.library).kind === 'component'
        ? { kind: StatementKind.COMPONENT_ON_PATH }
        : null;
    },
  },
  {
    name: 'multi-segment-path',
    match: ({ operators }) => (operators.length >= 2 ? { kind: StatementKind.MULTI_SEGMENT_PATH } : null),
  },
  {
    name: 'simple-wire',
    match: ({ operators }) => (operators.length === 1 ? { kind: StatementKind.SIMPLE_WIRE } : null),
  },
  {
    name: 'node-on-path',
    match: (shape) => {
      if (!isPathCommand(shape) || shape.operators.length > 0 || shape.pointCount !== 1) return null;
      const placesNode = shape.words.some((word) => word.keyword === 'node' || word.keyword === 'coordinate');
      return placesNode ? { kind: StatementKind.STANDALONE_NODE } : null;
    },
  },
  {
    name: 'fallback',
    match: ({ pointCount }) =>
      unrecognized(pointCount === 0 ? 'Statement draws nothing' : 'Statement has no recognizable shape'),
  },
];

/**
 * Count path points: coordinates that are not node names, `coordinate`
 * names or `at` positions
 */
function countPoints(tokens: Token[]): number {
  let count = 0;
  let previous: Token | null = null;
  let inNode = false;

  for (const token of tokens) {
    const word = token.type === TokenType.KEYWORD ? token.keyword.replace(/^\\/, '') : null;
    if (word === 'node' || word === 'coordinate') {
      inNode = word === 'node';
    } else if (token.type === TokenType.TEXT) {
      inNode = false;
    } else if (token.type === TokenType.COORDINATE) {
      const isName =
        previous?.type === TokenType.KEYWORD && previous.keyword.replace(/^\\/, '') === 'coordinate';
      const isPosition = previous?.type === TokenType.KEYWORD && previous.keyword === 'at';
      if (!inNode && !isName && !isPosition) count++;
    }
    previous = token;
  }

  return count;
}

export function describeStatement(tokens: Token[], library: ComponentLibrary = defaultLibrary): StatementShape {
  const first = tokens[0];
  const head =
    first !== undefined && first.type === TokenType.KEYWORD && first.keyword.startsWith('\\') ? first : null;

  const operators: PathOpToken[] = [];
  const words: KeywordToken[] = [];
  for (const token of tokens.slice(head === null ? 0 : 1)) {
    if (token.type === TokenType.PATH_OP) operators.push(token);
    else if (token.type === TokenType.KEYWORD) words.push(token);
  }

  return { tokens, head, operators, pointCount: countPoints(tokens), words, library };
}

/**
 * Decide the semantic shape of one tokenized statement
 *
 * @example
 * ```ts
 * classify(new Lexer().tokenize('\\draw (0,0) to[R] (2,0);'))
 * // => { kind: 'ComponentOnPath', rule: 'component-on-path' }
 * ```
 */
export function classify(tokens: Token[], library: ComponentLibrary = defaultLibrary): Classification {
  const shape = describeStatement(tokens, library);

  for (const rule of CLASSIFICATION_RULES) {
    const result = rule.match(shape);
    if (result) {
      return { ...result, rule: rule.name };
    }
  }

  // The fallback rule always matches
  return { kind: StatementKind.UNRECOGNIZED, rule: 'fallback', reason: 'Statement has no recognizable shape' };
}
