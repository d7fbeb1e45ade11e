import type {SourceLocation} from './ast.js';

export const DiagnosticSeverity = {
  Error: 1,
  Warning: 2,
  Information: 3,
} as const;

export type DiagnosticSeverity =
  (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity];

export const DiagnosticCode = {
  // Lexer Errors (1-999)
  LexicalError: 1,

  // Parser Errors (1000-1999)
  UnexpectedToken: 1001,
  ExpectedToken: 1002,
  NestingTooDeep: 1003,

  // Construction Errors (2000-2999)
  InvalidName: 2001,
  DuplicateParameter: 2002,
  ConflictingStarParameters: 2003,
  ParameterAfterKeywordArguments: 2004,
  BareStarWithoutNamedParameters: 2005,
  MisplacedEllipsisParameter: 2006,
  TypeVarNameMismatch: 2007,
  InvalidTypeVar: 2008,
  DuplicateNamedTupleField: 2009,
  UnsupportedCondition: 2010,
  UnbalancedConditional: 2011,
  InvalidClassKeyword: 2012,
} as const;

export type DiagnosticCode =
  (typeof DiagnosticCode)[keyof typeof DiagnosticCode];

export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  severity: DiagnosticSeverity;
  location: SourceLocation;
}

/**
 * The single error a failed parse produces. Lexical faults, grammar
 * violations and rejected constructions all surface as this class; `code`
 * tells them apart.
 */
export class ParseError extends Error {
  readonly code: DiagnosticCode;
  readonly location: SourceLocation;

  constructor(message: string, code: DiagnosticCode, location: SourceLocation) {
    super(message);
    this.name = 'ParseError';
    this.code = code;
    this.location = location;
  }

  toDiagnostic(): Diagnostic {
    return {
      code: this.code,
      message: this.message,
      severity: DiagnosticSeverity.Error,
      location: this.location,
    };
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
