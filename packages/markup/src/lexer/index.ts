export { parseCoordinate, parseLength } from './coordinate.js';
export { Lexer, type LexerOptions } from './lexer.js';
export {
  NODE_COMMANDS,
  PATH_COMMANDS,
  PathOperator,
  STATEMENT_COMMANDS,
  TokenType,
} from './token-types.js';
export type {
  CoordinateSpec,
  CoordinateToken,
  DelimiterToken,
  KeywordToken,
  Length,
  LengthUnit,
  OptionBlockToken,
  PathOpToken,
  Shift,
  SourceLocation,
  SourcePosition,
  TextToken,
  Token,
} from './token.js';
