/**
 * Token types for the drawing-statement lexer
 *
 * One statement of CircuiTikZ markup scans into a flat sequence of these.
 */

export const TokenType = {
  // Commands (\draw, \node, \begin{scope}) and bare words (node, at, cycle)
  KEYWORD: 'KEYWORD',

  // Regions
  COORDINATE: 'COORDINATE', // (1,2), +(1,0), (A.north)
  OPTION_BLOCK: 'OPTION_BLOCK', // [R, l=$R_1$]
  TEXT: 'TEXT', // {$V_{in}$}

  // Connectors between path points
  PATH_OP: 'PATH_OP', // --, to, -|, |-

  // Statement terminator
  DELIMITER: 'DELIMITER', // ;
} as const;

export type TokenType = (typeof TokenType)[keyof typeof TokenType];

export const PathOperator = {
  LINE: '--',
  TO: 'to',
  HORIZONTAL_VERTICAL: '-|',
  VERTICAL_HORIZONTAL: '|-',
} as const;

export type PathOperator = (typeof PathOperator)[keyof typeof PathOperator];

/**
 * Commands that open a drawing statement
 */
export const PATH_COMMANDS: ReadonlySet<string> = new Set(['\\draw', '\\path', '\\fill', '\\filldraw']);

export const NODE_COMMANDS: ReadonlySet<string> = new Set(['\\node', '\\coordinate']);

/**
 * Commands the splitter treats as the start of a new statement
 */
export const STATEMENT_COMMANDS: ReadonlySet<string> = new Set([
  ...PATH_COMMANDS,
  ...NODE_COMMANDS,
  '\\begin',
  '\\end',
]);
