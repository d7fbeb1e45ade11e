import {
  NodeType,
  NodeConstructionError,
  createAnything,
  createEllipsis,
  createNamedType,
  createNothing,
  isDottedName,
  isTypeExpr,
  type AnythingType,
  type ClassDef,
  type ClassMember,
  type ClassType,
  type Condition,
  type ConditionalBlock,
  type Constant,
  type Alias,
  type Declaration,
  type EllipsisType,
  type FromImport,
  type FuncDef,
  type FunctionBody,
  type GenericType,
  type ImportItem,
  type KeywordParent,
  type Mutator,
  type NamedTupleField,
  type NamedTupleType,
  type NamedType,
  type NothingType,
  type Param,
  type ParamDefault,
  type Parent,
  type PlainImport,
  type SourceLocation,
  type StarKind,
  type TypeExpr,
  type TypeParameterType,
  type TypeVarDef,
  type UnionType,
  type Unit,
} from './ast.js';
import {
  evaluateCondition,
  isEqualityOperator,
  resolve,
  type ConditionEnvironment,
} from './conditions.js';
import {DiagnosticCode, ParseError} from './diagnostics.js';
import type {ResolvedParserOptions} from './options.js';

export interface FunctionParts {
  decorators: string[];
  name: string;
  params: (Param | EllipsisType)[];
  returnType: TypeExpr;
  raises: TypeExpr[];
  body: FunctionBody;
  mutators: Mutator[];
}

export interface TypeVarArgument {
  keyword?: string;
  value: TypeExpr;
}

interface ConditionState {
  /** Some branch of this chain has already been selected. */
  taken: boolean;
  /** The branch currently being parsed is the selected one. */
  active: boolean;
}

const RADIX_PREFIX = /^[-+]?0[xXoObB]/;

const START: SourceLocation = {line: 1, column: 1, endLine: 1, endColumn: 1};

/**
 * Per-parse construction state. The parser calls one method per completed
 * production after pointing `location` at the production's span; every
 * rejection is a `ParseError` at that span.
 *
 * Class names and type variables are remembered so later type references to
 * them become `ClassType` and `TypeParameterType` nodes. Registrations made
 * inside a conditional branch that is not selected are skipped.
 */
export class ParserContext {
  #env: ConditionEnvironment;
  #classNames = new Set<string>();
  #typeParameters = new Set<string>();
  #conditions: ConditionState[] = [];
  #location: SourceLocation = START;

  constructor(options: ResolvedParserOptions) {
    this.#env = {
      targetVersion: options.targetVersion,
      platform: options.platform,
    };
  }

  get location(): SourceLocation {
    return this.#location;
  }

  setLocation(loc: SourceLocation): this {
    this.#location = loc;
    return this;
  }

  /** True unless we are inside a conditional branch that was not selected. */
  get isActive(): boolean {
    return this.#conditions.every((c) => c.active);
  }

  isClassName(name: string): boolean {
    return this.#classNames.has(name);
  }

  isTypeParameter(name: string): boolean {
    return this.#typeParameters.has(name);
  }

  #fail(message: string, code: DiagnosticCode): never {
    throw new ParseError(message, code, this.#location);
  }

  #loc(): SourceLocation {
    return {...this.#location};
  }

  newUnit(body: Declaration[], docstring?: string): Unit {
    if (this.#conditions.length > 0) {
      this.#fail(
        'Unterminated conditional block.',
        DiagnosticCode.UnbalancedConditional,
      );
    }
    return {type: NodeType.Unit, body, docstring, loc: this.#loc()};
  }

  // Types

  newType(name: string): NamedType | ClassType | TypeParameterType {
    const named = this.#namedType(name);
    if (this.#typeParameters.has(name)) {
      return {type: NodeType.TypeParameterType, name, loc: named.loc};
    }
    if (this.#classNames.has(name)) {
      return {type: NodeType.ClassType, name, loc: named.loc};
    }
    return named;
  }

  #namedType(name: string): NamedType {
    try {
      return createNamedType(name, this.#loc());
    } catch (e) {
      if (e instanceof NodeConstructionError) {
        this.#fail(e.message, DiagnosticCode.InvalidName);
      }
      throw e;
    }
  }

  newGenericType(baseName: string, parameters: TypeExpr[]): GenericType {
    const base = this.newType(baseName);
    if (base.type === NodeType.TypeParameterType) {
      this.#fail(
        `Type parameter '${baseName}' cannot take parameters.`,
        DiagnosticCode.InvalidName,
      );
    }
    return {type: NodeType.GenericType, base, parameters, loc: this.#loc()};
  }

  /** `[a, b]` shorthand for `tuple[a, b]`. */
  newTupleType(elements: TypeExpr[]): GenericType {
    return {
      type: NodeType.GenericType,
      base: this.#namedType('tuple'),
      parameters: elements,
      loc: this.#loc(),
    };
  }

  newUnionType(left: TypeExpr, right: TypeExpr): UnionType {
    return {type: NodeType.UnionType, left, right, loc: this.#loc()};
  }

  newAnything(): AnythingType {
    return createAnything(this.#loc());
  }

  newNothing(): NothingType {
    return createNothing(this.#loc());
  }

  newEllipsis(): EllipsisType {
    return createEllipsis(this.#loc());
  }

  newNamedTuple(name: string, fields: NamedTupleField[]): NamedTupleType {
    const seen = new Set<string>();
    for (const field of fields) {
      if (seen.has(field.name)) {
        this.#fail(
          `Duplicate field '${field.name}' in NamedTuple '${name}'.`,
          DiagnosticCode.DuplicateNamedTupleField,
        );
      }
      seen.add(field.name);
    }
    return {type: NodeType.NamedTupleType, name, fields, loc: this.#loc()};
  }

  // Classes

  /**
   * Must run before the class body is parsed so the body can refer to the
   * class by name.
   */
  registerClassName(name: string): string {
    if (!isDottedName(name) || name.includes('.')) {
      this.#fail(`Invalid class name '${name}'.`, DiagnosticCode.InvalidName);
    }
    if (this.isActive) {
      this.#classNames.add(name);
    }
    return name;
  }

  newKeywordParent(keyword: string, value: TypeExpr): KeywordParent {
    if (keyword !== 'metaclass') {
      this.#fail(
        `Only 'metaclass' is allowed as a class keyword, got '${keyword}'.`,
        DiagnosticCode.InvalidClassKeyword,
      );
    }
    return {type: NodeType.KeywordParent, keyword, value, loc: this.#loc()};
  }

  newClass(
    name: string,
    parents: Parent[],
    body: ClassMember[],
    docstring?: string,
  ): ClassDef {
    let keywords = 0;
    for (const parent of parents) {
      if (!isTypeExpr(parent) && ++keywords > 1) {
        this.#fail(
          `Duplicate class keyword '${parent.keyword}'.`,
          DiagnosticCode.InvalidClassKeyword,
        );
      }
    }
    return {
      type: NodeType.ClassDef,
      name,
      parents,
      body,
      docstring,
      loc: this.#loc(),
    };
  }

  // Functions

  newParam(
    name: string,
    starKind: StarKind,
    paramType?: TypeExpr,
    defaultValue?: ParamDefault,
  ): Param {
    return {
      type: NodeType.Param,
      name,
      paramType,
      defaultValue,
      starKind,
      loc: this.#loc(),
    };
  }

  newMutator(name: string, value: TypeExpr): Mutator {
    return {type: NodeType.Mutator, name, value, loc: this.#loc()};
  }

  newFunction(parts: FunctionParts): FuncDef {
    const params: Param[] = [];
    let acceptsExtraArgs = false;
    parts.params.forEach((param, index) => {
      if (param.type === NodeType.EllipsisType) {
        if (index !== parts.params.length - 1) {
          this.#fail(
            "'...' must be the last parameter.",
            DiagnosticCode.MisplacedEllipsisParameter,
          );
        }
        acceptsExtraArgs = true;
      } else {
        params.push(param);
      }
    });
    this.#checkParams(params);

    return {
      type: NodeType.FuncDef,
      name: parts.name,
      decorators: parts.decorators,
      params,
      returnType: parts.returnType,
      raises: parts.raises,
      body: parts.body,
      mutators: parts.mutators,
      acceptsExtraArgs,
      loc: this.#loc(),
    };
  }

  #checkParams(params: Param[]) {
    const names = new Set<string>();
    let sawStar = false;
    let sawDoubleStar = false;
    params.forEach((param, index) => {
      if (sawDoubleStar) {
        this.#fail(
          `Parameter '${param.name}' follows the '**' parameter.`,
          DiagnosticCode.ParameterAfterKeywordArguments,
        );
      }
      if (param.starKind === 'star') {
        if (sawStar) {
          this.#fail(
            'Only one of a bare * and *args is allowed.',
            DiagnosticCode.ConflictingStarParameters,
          );
        }
        sawStar = true;
        if (param.name === '*') {
          const next = params[index + 1];
          if (next === undefined || next.starKind !== 'none') {
            this.#fail(
              'Named parameters must follow a bare *.',
              DiagnosticCode.BareStarWithoutNamedParameters,
            );
          }
          return;
        }
      } else if (param.starKind === 'double-star') {
        sawDoubleStar = true;
      }
      if (names.has(param.name)) {
        this.#fail(
          `Duplicate parameter '${param.name}'.`,
          DiagnosticCode.DuplicateParameter,
        );
      }
      names.add(param.name);
    });
  }

  /** `def name EXTERNAL`: a function whose signature lives elsewhere. */
  newExternalFunction(decorators: string[], name: string): FuncDef {
    return {
      type: NodeType.FuncDef,
      name,
      decorators,
      params: [],
      returnType: this.newAnything(),
      raises: [],
      body: 'external',
      mutators: [],
      acceptsExtraArgs: false,
      loc: this.#loc(),
    };
  }

  // Module level values

  newConstant(name: string, valueType: TypeExpr): Constant {
    return {type: NodeType.Constant, name, valueType, loc: this.#loc()};
  }

  /**
   * `x = 3` and `x = 3.5`: the type follows from the literal. Only a decimal
   * point or an exponent makes a float; signed and prefixed integers such as
   * `-1` and `0x1E` are ints.
   */
  newNumberConstant(name: string, literal: string): Constant {
    const isFloat = !RADIX_PREFIX.test(literal) && /[.eE]/.test(literal);
    const typeName = isFloat ? 'float' : 'int';
    return this.newConstant(name, this.#namedType(typeName));
  }

  newAlias(name: string, target: TypeExpr): Alias {
    return {type: NodeType.Alias, name, target, loc: this.#loc()};
  }

  newImport(items: ImportItem[]): PlainImport {
    return {type: NodeType.PlainImport, items, loc: this.#loc()};
  }

  newFromImport(module: string, items: ImportItem[]): FromImport {
    if (items.length > 1 && items.some((item) => item.name === '*')) {
      this.#fail(
        `'*' must be the only name imported from '${module}'.`,
        DiagnosticCode.InvalidName,
      );
    }
    return {type: NodeType.FromImport, module, items, loc: this.#loc()};
  }

  newTypeVar(
    name: string,
    declaredName: string,
    args: TypeVarArgument[],
  ): TypeVarDef {
    if (declaredName !== name) {
      this.#fail(
        `TypeVar name needs to be '${name}' (not '${declaredName}').`,
        DiagnosticCode.TypeVarNameMismatch,
      );
    }
    const constraints: TypeExpr[] = [];
    let bound: TypeExpr | undefined;
    for (const arg of args) {
      if (arg.keyword === undefined) {
        if (bound !== undefined) {
          this.#fail(
            'Positional TypeVar arguments must come before keywords.',
            DiagnosticCode.InvalidTypeVar,
          );
        }
        constraints.push(arg.value);
      } else if (arg.keyword !== 'bound') {
        this.#fail(
          `Unsupported TypeVar argument '${arg.keyword}'.`,
          DiagnosticCode.InvalidTypeVar,
        );
      } else if (bound !== undefined) {
        this.#fail(
          "TypeVar 'bound' given more than once.",
          DiagnosticCode.InvalidTypeVar,
        );
      } else {
        bound = arg.value;
      }
    }
    if (constraints.length === 1) {
      this.#fail(
        'A TypeVar needs no constraints or at least two.',
        DiagnosticCode.InvalidTypeVar,
      );
    }
    if (bound !== undefined && constraints.length > 0) {
      this.#fail(
        'A TypeVar cannot have both constraints and a bound.',
        DiagnosticCode.InvalidTypeVar,
      );
    }
    if (this.isActive) {
      this.#typeParameters.add(name);
    }
    return {
      type: NodeType.TypeVarDef,
      name,
      constraints,
      bound,
      loc: this.#loc(),
    };
  }

  // Conditionals

  #checkCondition(condition: Condition) {
    const {operand, operator} = condition;
    if (operand.kind === 'name' && !isEqualityOperator(operator)) {
      this.#fail(
        `'${operand.name}' can only be compared with == or !=.`,
        DiagnosticCode.UnsupportedCondition,
      );
    }
    if (operand.kind === 'version') {
      for (const part of operand.parts) {
        if (!Number.isInteger(part) || part < 0) {
          this.#fail(
            `Version components must be non-negative integers, got ${part}.`,
            DiagnosticCode.UnsupportedCondition,
          );
        }
      }
    }
  }

  #currentCondition(keyword: string): ConditionState {
    const state = this.#conditions[this.#conditions.length - 1];
    if (state === undefined) {
      this.#fail(
        `'${keyword}' without a matching 'if'.`,
        DiagnosticCode.UnbalancedConditional,
      );
    }
    return state;
  }

  ifBegin(condition: Condition) {
    this.#checkCondition(condition);
    const active = evaluateCondition(condition, this.#env);
    this.#conditions.push({taken: active, active});
  }

  ifElif(condition: Condition) {
    this.#checkCondition(condition);
    const state = this.#currentCondition('elif');
    if (state.taken) {
      state.active = false;
    } else {
      state.active = evaluateCondition(condition, this.#env);
      state.taken = state.active;
    }
  }

  ifElse() {
    const state = this.#currentCondition('else');
    state.active = !state.taken;
    state.taken = true;
  }

  /**
   * Closes the innermost conditional and returns the declarations of the
   * selected branch, to be spliced into the enclosing scope.
   */
  ifEnd<T>(block: ConditionalBlock<T>): T[] {
    this.#currentCondition('end of if');
    this.#conditions.pop();
    return resolve(block, this.#env);
  }
}
