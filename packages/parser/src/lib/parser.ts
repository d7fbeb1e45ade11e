import {
  NodeType,
  type ClassDef,
  type ClassMember,
  type ComparisonOperator,
  type Condition,
  type ConditionalBlock,
  type ConditionalBranch,
  type ConditionOperand,
  type Constant,
  type Declaration,
  type EllipsisType,
  type FuncDef,
  type FunctionBody,
  type ImportItem,
  type Mutator,
  type NamedTupleField,
  type Param,
  type ParamDefault,
  type Parent,
  type SourceLocation,
  type TypeExpr,
  type TypeVarDef,
  type Unit,
} from './ast.js';
import {ParserContext, type TypeVarArgument} from './context.js';
import {DiagnosticCode, ParseError} from './diagnostics.js';
import {
  TokenType,
  describeToken,
  describeTokenType,
  type Lexer,
  type Token,
} from './lexer.js';
import {appendList, extendList, startList} from './lists.js';
import {resolveOptions, type ParserOptions} from './options.js';

const COMPARISON_OPERATORS: Partial<Record<TokenType, ComparisonOperator>> = {
  [TokenType.Less]: '<',
  [TokenType.Greater]: '>',
  [TokenType.LessEquals]: '<=',
  [TokenType.GreaterEquals]: '>=',
  [TokenType.EqualsEquals]: '==',
  [TokenType.BangEquals]: '!=',
};

/**
 * Recursive descent parser for stub files. Pulls tokens from the lexer one at
 * a time and never looks further ahead than the next token. Each completed
 * production is handed to a `ParserContext`, which builds the node.
 *
 * A parser instance parses exactly one unit.
 */
export class Parser {
  #lexer: Lexer;
  #ctx: ParserContext;
  #token: Token;
  /** Last consumed token, not counting indents and dedents. */
  #previous: Token | null = null;
  #used = false;

  constructor(lexer: Lexer, options?: ParserOptions) {
    this.#lexer = lexer;
    this.#ctx = new ParserContext(resolveOptions(options));
    this.#token = lexer.next();
  }

  public parse(): Unit {
    if (this.#used) {
      throw new Error('Parser instances can only parse once.');
    }
    this.#used = true;
    try {
      return this.#parseUnit();
    } catch (e) {
      if (e instanceof RangeError) {
        throw new ParseError(
          'Input is nested too deeply.',
          DiagnosticCode.NestingTooDeep,
          this.#token.loc,
        );
      }
      throw e;
    }
  }

  #parseUnit(): Unit {
    this.#checkLexError(this.#token);

    const startToken = this.#token;
    let docstring: string | undefined;
    if (this.#match(TokenType.TripleQuoted)) {
      docstring = this.#previousToken().value;
    }
    const body = this.#parseDefinitions(TokenType.EOF);
    return this.#ctx
      .setLocation(this.#span(startToken.loc, this.#token.loc))
      .newUnit(body, docstring);
  }

  #parseDefinitions(terminator: TokenType): Declaration[] {
    const definitions: Declaration[] = [];
    while (!this.#check(terminator)) {
      if (this.#check(TokenType.If)) {
        extendList(
          definitions,
          this.#parseIfStatement(() =>
            this.#parseDefinitions(TokenType.Dedent),
          ),
        );
      } else {
        appendList(definitions, this.#parseDefinition());
      }
    }
    return definitions;
  }

  #parseDefinition(): Declaration {
    switch (this.#token.type) {
      case TokenType.Class:
        return this.#parseClass();
      case TokenType.Def:
      case TokenType.At:
        return this.#parseFunction();
      case TokenType.Import:
        return this.#parseImport();
      case TokenType.From:
        return this.#parseFromImport();
      case TokenType.Name:
        return this.#parseNameDefinition();
      default:
        throw this.#unexpected('a declaration');
    }
  }

  // `x: T`, `x = ...`, `X = T`, `T = TypeVar(T, ...)`
  #parseNameDefinition(): Declaration {
    const nameToken = this.#advance();
    if (this.#check(TokenType.Colon)) {
      return this.#parseConstantRest(nameToken);
    }
    this.#consume(TokenType.Equals);
    if (this.#check(TokenType.Number) || this.#check(TokenType.Ellipsis)) {
      return this.#parseAssignedConstant(nameToken);
    }
    if (this.#match(TokenType.TypeVar)) {
      return this.#parseTypeVarRest(nameToken);
    }
    const target = this.#parseType();
    return this.#at(nameToken).newAlias(nameToken.value, target);
  }

  #parseConstant(): Constant {
    const nameToken = this.#consume(TokenType.Name);
    if (this.#check(TokenType.Colon)) {
      return this.#parseConstantRest(nameToken);
    }
    this.#consume(TokenType.Equals);
    return this.#parseAssignedConstant(nameToken);
  }

  // `: T` or `: T = ...`
  #parseConstantRest(nameToken: Token): Constant {
    this.#consume(TokenType.Colon);
    const valueType = this.#parseType();
    if (this.#match(TokenType.Equals)) {
      this.#consume(TokenType.Ellipsis);
    }
    return this.#at(nameToken).newConstant(nameToken.value, valueType);
  }

  // After `=`: a number, or `...` with an optional type comment.
  #parseAssignedConstant(nameToken: Token): Constant {
    if (this.#match(TokenType.Number)) {
      return this.#at(nameToken).newNumberConstant(
        nameToken.value,
        this.#previousToken().value,
      );
    }
    const ellipsis = this.#consume(TokenType.Ellipsis);
    let valueType: TypeExpr;
    if (this.#match(TokenType.TypeComment)) {
      valueType = this.#parseType();
    } else {
      valueType = this.#at(ellipsis).newAnything();
    }
    return this.#at(nameToken).newConstant(nameToken.value, valueType);
  }

  #parseTypeVarRest(nameToken: Token): TypeVarDef {
    this.#consume(TokenType.LParen);
    const declaredName = this.#consume(TokenType.Name).value;
    const args: TypeVarArgument[] = [];
    while (this.#match(TokenType.Comma)) {
      if (this.#check(TokenType.Name)) {
        const first = this.#advance();
        if (this.#match(TokenType.Equals)) {
          args.push({keyword: first.value, value: this.#parseType()});
        } else {
          args.push({value: this.#parseType(first)});
        }
      } else {
        args.push({value: this.#parseType()});
      }
    }
    this.#consume(TokenType.RParen);
    return this.#at(nameToken).newTypeVar(nameToken.value, declaredName, args);
  }

  // Imports

  #parseImport(): Declaration {
    const startToken = this.#consume(TokenType.Import);
    const items = startList(this.#parseImportItem());
    while (this.#match(TokenType.Comma)) {
      appendList(items, this.#parseImportItem());
    }
    return this.#at(startToken).newImport(items);
  }

  #parseImportItem(): ImportItem {
    const item: ImportItem = {name: this.#parseDottedName()};
    if (this.#match(TokenType.As)) {
      item.alias = this.#consume(TokenType.Name).value;
    }
    return item;
  }

  #parseFromImport(): Declaration {
    const startToken = this.#consume(TokenType.From);
    const module = this.#parseDottedName();
    this.#consume(TokenType.Import);
    let items: ImportItem[];
    if (this.#match(TokenType.LParen)) {
      items = startList(this.#parseFromItem());
      while (this.#match(TokenType.Comma)) {
        if (this.#check(TokenType.RParen)) break;
        appendList(items, this.#parseFromItem());
      }
      this.#consume(TokenType.RParen);
    } else {
      items = startList(this.#parseFromItem());
      while (this.#match(TokenType.Comma)) {
        appendList(items, this.#parseFromItem());
      }
    }
    return this.#at(startToken).newFromImport(module, items);
  }

  #parseFromItem(): ImportItem {
    if (
      this.#match(TokenType.NamedTuple) ||
      this.#match(TokenType.TypeVar) ||
      this.#match(TokenType.Star)
    ) {
      return {name: this.#previousToken().value};
    }
    if (!this.#check(TokenType.Name)) {
      throw this.#unexpected('a name to import');
    }
    const item: ImportItem = {name: this.#advance().value};
    if (this.#match(TokenType.As)) {
      item.alias = this.#consume(TokenType.Name).value;
    }
    return item;
  }

  // Classes

  #parseClass(): ClassDef {
    const startToken = this.#consume(TokenType.Class);
    const nameToken = this.#consume(TokenType.Name);
    const name = this.#at(nameToken).registerClassName(nameToken.value);

    const parents: Parent[] = [];
    if (this.#match(TokenType.LParen)) {
      if (!this.#check(TokenType.RParen)) {
        do {
          parents.push(this.#parseParent());
        } while (this.#match(TokenType.Comma));
      }
      this.#consume(TokenType.RParen);
    }
    this.#consume(TokenType.Colon);

    let docstring: string | undefined;
    let body: ClassMember[] = [];
    if (!this.#match(TokenType.Pass) && !this.#match(TokenType.Ellipsis)) {
      this.#consume(TokenType.Indent);
      if (this.#match(TokenType.TripleQuoted)) {
        docstring = this.#previousToken().value;
      }
      if (!this.#match(TokenType.Pass) && !this.#match(TokenType.Ellipsis)) {
        body = this.#parseClassMembers();
      }
      this.#consume(TokenType.Dedent);
    }
    return this.#at(startToken).newClass(name, parents, body, docstring);
  }

  #parseParent(): Parent {
    if (!this.#check(TokenType.Name)) {
      return this.#parseType();
    }
    const first = this.#advance();
    if (this.#match(TokenType.Equals)) {
      const value = this.#parseType();
      return this.#at(first).newKeywordParent(first.value, value);
    }
    return this.#parseType(first);
  }

  #parseClassMembers(): ClassMember[] {
    const members: ClassMember[] = [];
    while (!this.#check(TokenType.Dedent)) {
      switch (this.#token.type) {
        case TokenType.If:
          extendList(
            members,
            this.#parseIfStatement(() => this.#parseClassMembers()),
          );
          break;
        case TokenType.Def:
        case TokenType.At:
          appendList(members, this.#parseFunction());
          break;
        case TokenType.Name:
          appendList(members, this.#parseConstant());
          break;
        default:
          throw this.#unexpected('a method, constant or dedent');
      }
    }
    return members;
  }

  // Functions

  #parseFunction(): FuncDef {
    const decorators: string[] = [];
    while (this.#match(TokenType.At)) {
      decorators.push(this.#parseDottedName());
    }

    // Decorators are left out of the span so errors point at `def`.
    const defToken = this.#consume(TokenType.Def);
    const name = this.#consume(TokenType.Name).value;
    if (this.#match(TokenType.ExternalCode)) {
      return this.#at(defToken).newExternalFunction(decorators, name);
    }

    this.#consume(TokenType.LParen);
    const params = this.#check(TokenType.RParen) ? [] : this.#parseParams();
    this.#consume(TokenType.RParen);

    let returnType: TypeExpr;
    if (this.#match(TokenType.Arrow)) {
      returnType = this.#parseType();
    } else {
      returnType = this.#ctx.setLocation(this.#emptyLoc()).newAnything();
    }

    const raises: TypeExpr[] = [];
    if (this.#match(TokenType.Raises)) {
      do {
        raises.push(this.#parseType());
      } while (this.#match(TokenType.Comma));
    }

    const {body, mutators} = this.#parseFunctionBody();
    return this.#at(defToken).newFunction({
      decorators,
      name,
      params,
      returnType,
      raises,
      body,
      mutators,
    });
  }

  #parseParams(): (Param | EllipsisType)[] {
    const params = startList(this.#parseParam());
    while (this.#match(TokenType.Comma)) {
      appendList(params, this.#parseParam());
    }
    return params;
  }

  #parseParam(): Param | EllipsisType {
    const startToken = this.#token;
    if (this.#match(TokenType.Ellipsis)) {
      return this.#at(startToken).newEllipsis();
    }
    if (this.#match(TokenType.Star)) {
      if (this.#match(TokenType.Star)) {
        const name = this.#consume(TokenType.Name).value;
        const paramType = this.#parseParamType();
        return this.#at(startToken).newParam(name, 'double-star', paramType);
      }
      if (this.#check(TokenType.Name)) {
        const name = this.#advance().value;
        const paramType = this.#parseParamType();
        return this.#at(startToken).newParam(name, 'star', paramType);
      }
      return this.#at(startToken).newParam('*', 'star');
    }
    if (!this.#check(TokenType.Name)) {
      throw this.#unexpected('a parameter');
    }
    const name = this.#advance().value;
    const paramType = this.#parseParamType();
    let defaultValue: ParamDefault | undefined;
    if (this.#match(TokenType.Equals)) {
      defaultValue = this.#parseParamDefault();
    }
    return this.#at(startToken).newParam(name, 'none', paramType, defaultValue);
  }

  #parseParamType(): TypeExpr | undefined {
    return this.#match(TokenType.Colon) ? this.#parseType() : undefined;
  }

  #parseParamDefault(): ParamDefault {
    if (this.#match(TokenType.Name)) {
      return {kind: 'name', value: this.#previousToken().value};
    }
    if (this.#match(TokenType.Number)) {
      return {kind: 'number', value: this.#previousToken().value};
    }
    if (this.#match(TokenType.Ellipsis)) {
      return {kind: 'ellipsis', value: '...'};
    }
    throw this.#unexpected("a default value (name, number or '...')");
  }

  #parseFunctionBody(): {body: FunctionBody; mutators: Mutator[]} {
    const mutators: Mutator[] = [];
    if (!this.#match(TokenType.Colon)) {
      return {body: 'ellipsis', mutators};
    }
    if (this.#match(TokenType.Pass)) return {body: 'pass', mutators};
    if (this.#match(TokenType.Ellipsis)) return {body: 'ellipsis', mutators};

    this.#consume(TokenType.Indent);
    let body: FunctionBody;
    if (this.#match(TokenType.Pass)) {
      body = 'pass';
    } else if (
      this.#match(TokenType.Ellipsis) ||
      this.#match(TokenType.TripleQuoted)
    ) {
      body = 'ellipsis';
    } else {
      body = 'statements';
      do {
        const mutator = this.#parseBodyStatement();
        if (mutator) mutators.push(mutator);
      } while (!this.#check(TokenType.Dedent));
    }
    this.#consume(TokenType.Dedent);
    return {body, mutators};
  }

  // `name := type`, or `raise T` / `raise T()` which produce nothing.
  #parseBodyStatement(): Mutator | undefined {
    if (this.#match(TokenType.Raise)) {
      this.#parseType();
      if (this.#match(TokenType.LParen)) {
        this.#consume(TokenType.RParen);
      }
      return undefined;
    }
    if (!this.#check(TokenType.Name)) {
      throw this.#unexpected("a body statement ('name := type' or 'raise')");
    }
    const nameToken = this.#advance();
    this.#consume(TokenType.ColonEquals);
    const value = this.#parseType();
    return this.#at(nameToken).newMutator(nameToken.value, value);
  }

  // Conditionals

  #parseIfStatement<T>(parseBody: () => T[]): T[] {
    const startToken = this.#consume(TokenType.If);
    const branches: ConditionalBranch<T>[] = [];

    const condition = this.#parseCondition();
    this.#at(startToken).ifBegin(condition);
    branches.push(this.#parseBranch(startToken, condition, parseBody));

    while (this.#check(TokenType.Elif)) {
      const elifToken = this.#advance();
      const elifCondition = this.#parseCondition();
      this.#at(elifToken).ifElif(elifCondition);
      branches.push(this.#parseBranch(elifToken, elifCondition, parseBody));
    }

    if (this.#check(TokenType.Else)) {
      const elseToken = this.#advance();
      this.#at(elseToken).ifElse();
      branches.push(this.#parseBranch(elseToken, null, parseBody));
    }

    const block: ConditionalBlock<T> = {
      type: NodeType.ConditionalBlock,
      branches,
      loc: this.#span(startToken.loc, this.#previousToken().loc),
    };
    return this.#ctx.setLocation(block.loc).ifEnd(block);
  }

  #parseBranch<T>(
    startToken: Token,
    condition: Condition | null,
    parseBody: () => T[],
  ): ConditionalBranch<T> {
    this.#consume(TokenType.Colon);
    this.#consume(TokenType.Indent);
    const body = parseBody();
    this.#consume(TokenType.Dedent);
    return {
      type: NodeType.ConditionalBranch,
      condition,
      body,
      loc: this.#span(startToken.loc, this.#previousToken().loc),
    };
  }

  #parseCondition(): Condition {
    const subject = this.#parseDottedName();
    const operator = COMPARISON_OPERATORS[this.#token.type];
    if (operator === undefined) {
      throw this.#unexpected('a comparison operator');
    }
    this.#advance();

    let operand: ConditionOperand;
    if (this.#match(TokenType.Name)) {
      operand = {kind: 'name', name: this.#previousToken().value};
    } else if (this.#match(TokenType.LParen)) {
      operand = {kind: 'version', parts: this.#parseVersionTuple()};
    } else {
      throw this.#unexpected('a name or a version tuple');
    }
    return {subject, operator, operand};
  }

  // `(3,)`, `(3, 6)` or `(3, 6, 1)`, after the opening parenthesis.
  #parseVersionTuple(): number[] {
    const parts = startList(Number(this.#consume(TokenType.Number).value));
    this.#consume(TokenType.Comma);
    if (this.#match(TokenType.Number)) {
      appendList(parts, Number(this.#previousToken().value));
      if (this.#match(TokenType.Comma)) {
        appendList(parts, Number(this.#consume(TokenType.Number).value));
      }
    }
    this.#consume(TokenType.RParen);
    return parts;
  }

  // Types

  /**
   * Parses a type. When `first` is given, the leading name of the type has
   * already been consumed by the caller.
   */
  #parseType(first?: Token): TypeExpr {
    let left = this.#parsePrimaryType(first);
    while (this.#match(TokenType.Or)) {
      const right = this.#parsePrimaryType();
      left = this.#ctx
        .setLocation(this.#span(left.loc, right.loc))
        .newUnionType(left, right);
    }
    return left;
  }

  #parsePrimaryType(first?: Token): TypeExpr {
    if (first !== undefined || this.#check(TokenType.Name)) {
      return this.#parseNamedOrGenericType(first);
    }
    const startToken = this.#token;
    switch (startToken.type) {
      case TokenType.LBracket: {
        this.#advance();
        const elements: TypeExpr[] = [];
        if (!this.#check(TokenType.RBracket)) {
          do {
            elements.push(this.#parseType());
          } while (this.#match(TokenType.Comma));
        }
        this.#consume(TokenType.RBracket);
        return this.#at(startToken).newTupleType(elements);
      }
      case TokenType.NamedTuple:
        this.#advance();
        return this.#parseNamedTupleRest(startToken);
      case TokenType.LParen: {
        this.#advance();
        const inner = this.#parseType();
        this.#consume(TokenType.RParen);
        const loc = this.#span(startToken.loc, this.#previousToken().loc);
        return {...inner, loc};
      }
      case TokenType.Question:
        this.#advance();
        return this.#at(startToken).newAnything();
      case TokenType.Nothing:
        this.#advance();
        return this.#at(startToken).newNothing();
      default:
        throw this.#unexpected('a type');
    }
  }

  #parseNamedOrGenericType(first?: Token): TypeExpr {
    const startToken = first ?? this.#token;
    const name = this.#parseDottedName(first);
    if (!this.#match(TokenType.LBracket)) {
      return this.#at(startToken).newType(name);
    }
    const parameters: TypeExpr[] = [];
    do {
      if (this.#check(TokenType.Ellipsis)) {
        const ellipsis = this.#advance();
        parameters.push(this.#at(ellipsis).newEllipsis());
      } else {
        parameters.push(this.#parseType());
      }
    } while (this.#match(TokenType.Comma));
    this.#consume(TokenType.RBracket);
    return this.#at(startToken).newGenericType(name, parameters);
  }

  // `NamedTuple(Name, [(field, type), ...])`, after `NamedTuple`.
  #parseNamedTupleRest(startToken: Token): TypeExpr {
    this.#consume(TokenType.LParen);
    const name = this.#consume(TokenType.Name).value;
    this.#consume(TokenType.Comma);
    this.#consume(TokenType.LBracket);
    const fields: NamedTupleField[] = [];
    if (!this.#check(TokenType.RBracket)) {
      fields.push(this.#parseNamedTupleField());
      while (this.#match(TokenType.Comma)) {
        if (this.#check(TokenType.RBracket)) break;
        fields.push(this.#parseNamedTupleField());
      }
    }
    this.#consume(TokenType.RBracket);
    this.#consume(TokenType.RParen);
    return this.#at(startToken).newNamedTuple(name, fields);
  }

  #parseNamedTupleField(): NamedTupleField {
    this.#consume(TokenType.LParen);
    const name = this.#consume(TokenType.Name).value;
    this.#consume(TokenType.Comma);
    const fieldType = this.#parseType();
    this.#match(TokenType.Comma);
    this.#consume(TokenType.RParen);
    return {name, fieldType};
  }

  #parseDottedName(first?: Token): string {
    const parts = startList((first ?? this.#consume(TokenType.Name)).value);
    while (this.#match(TokenType.Dot)) {
      appendList(parts, this.#consume(TokenType.Name).value);
    }
    return parts.join('.');
  }

  // Helper methods

  /** Points the context at the span from `start` to the last consumed token. */
  #at(start: Token): ParserContext {
    return this.#ctx.setLocation(
      this.#span(start.loc, this.#previousToken().loc),
    );
  }

  #span(start: SourceLocation, end: SourceLocation): SourceLocation {
    return {
      line: start.line,
      column: start.column,
      endLine: end.endLine,
      endColumn: end.endColumn,
    };
  }

  /** Zero-width location just after the last consumed token. */
  #emptyLoc(): SourceLocation {
    const anchor = this.#previous?.loc;
    if (anchor === undefined) {
      const {line, column} = this.#token.loc;
      return {line, column, endLine: line, endColumn: column};
    }
    return {
      line: anchor.endLine,
      column: anchor.endColumn,
      endLine: anchor.endLine,
      endColumn: anchor.endColumn,
    };
  }

  #match(type: TokenType): boolean {
    if (this.#check(type)) {
      this.#advance();
      return true;
    }
    return false;
  }

  #check(type: TokenType): boolean {
    return this.#token.type === type;
  }

  #advance(): Token {
    const token = this.#token;
    if (token.type !== TokenType.EOF) {
      if (token.type !== TokenType.Indent && token.type !== TokenType.Dedent) {
        this.#previous = token;
      }
      this.#token = this.#lexer.next();
      this.#checkLexError(this.#token);
    }
    return token;
  }

  #previousToken(): Token {
    if (this.#previous === null) {
      throw new Error('No token has been consumed yet.');
    }
    return this.#previous;
  }

  #consume(type: TokenType): Token {
    if (this.#check(type)) return this.#advance();
    throw this.#unexpected(
      describeTokenType(type),
      DiagnosticCode.ExpectedToken,
    );
  }

  #unexpected(
    expected: string,
    code: DiagnosticCode = DiagnosticCode.UnexpectedToken,
  ): ParseError {
    const token = this.#token;
    return new ParseError(
      `Unexpected ${describeToken(token)}, expected ${expected}.`,
      code,
      token.loc,
    );
  }

  #checkLexError(token: Token) {
    if (token.type === TokenType.LexError) {
      throw new ParseError(token.value, DiagnosticCode.LexicalError, token.loc);
    }
  }
}
