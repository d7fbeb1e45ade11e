export const NodeType = {
  Unit: 'Unit',
  ClassDef: 'ClassDef',
  KeywordParent: 'KeywordParent',
  FuncDef: 'FuncDef',
  Param: 'Param',
  Mutator: 'Mutator',
  Constant: 'Constant',
  Alias: 'Alias',
  PlainImport: 'PlainImport',
  FromImport: 'FromImport',
  TypeVarDef: 'TypeVarDef',
  ConditionalBlock: 'ConditionalBlock',
  ConditionalBranch: 'ConditionalBranch',

  // Type expressions
  NamedType: 'NamedType',
  ClassType: 'ClassType',
  TypeParameterType: 'TypeParameterType',
  GenericType: 'GenericType',
  UnionType: 'UnionType',
  AnythingType: 'AnythingType',
  NothingType: 'NothingType',
  EllipsisType: 'EllipsisType',
  NamedTupleType: 'NamedTupleType',
} as const;

export type NodeType = (typeof NodeType)[keyof typeof NodeType];

/**
 * Source range of a node or token. Lines and columns are 1-based; the end
 * position is the position just past the last character.
 */
export interface SourceLocation {
  line: number;
  column: number;
  endLine: number;
  endColumn: number;
}

export interface Node {
  type: NodeType;
  loc: SourceLocation;
}

export interface Unit extends Node {
  type: typeof NodeType.Unit;
  body: Declaration[];
  docstring?: string;
}

export type Declaration =
  | ClassDef
  | FuncDef
  | Constant
  | Alias
  | PlainImport
  | FromImport
  | TypeVarDef;

export type ClassMember = FuncDef | Constant;

export interface KeywordParent extends Node {
  type: typeof NodeType.KeywordParent;
  keyword: string;
  value: TypeExpr;
}

export type Parent = TypeExpr | KeywordParent;

export interface ClassDef extends Node {
  type: typeof NodeType.ClassDef;
  name: string;
  parents: Parent[];
  body: ClassMember[];
  docstring?: string;
}

export type StarKind = 'none' | 'star' | 'double-star';

export interface ParamDefault {
  kind: 'name' | 'number' | 'ellipsis';
  value: string;
}

export interface Param extends Node {
  type: typeof NodeType.Param;
  /** `*` for the bare keyword-only separator. */
  name: string;
  paramType?: TypeExpr;
  defaultValue?: ParamDefault;
  starKind: StarKind;
}

/** A `name := type` line in a function body. */
export interface Mutator extends Node {
  type: typeof NodeType.Mutator;
  name: string;
  value: TypeExpr;
}

export type FunctionBody = 'ellipsis' | 'pass' | 'external' | 'statements';

export interface FuncDef extends Node {
  type: typeof NodeType.FuncDef;
  name: string;
  decorators: string[];
  params: Param[];
  returnType: TypeExpr;
  raises: TypeExpr[];
  body: FunctionBody;
  mutators: Mutator[];
  /** Set by a trailing `...` in the parameter list. */
  acceptsExtraArgs: boolean;
}

export interface Constant extends Node {
  type: typeof NodeType.Constant;
  name: string;
  valueType: TypeExpr;
}

export interface Alias extends Node {
  type: typeof NodeType.Alias;
  name: string;
  target: TypeExpr;
}

export interface ImportItem {
  name: string;
  alias?: string;
}

/** `import a.b, c as d` */
export interface PlainImport extends Node {
  type: typeof NodeType.PlainImport;
  items: ImportItem[];
}

/** `from m import a, b as c` */
export interface FromImport extends Node {
  type: typeof NodeType.FromImport;
  module: string;
  items: ImportItem[];
}

export interface TypeVarDef extends Node {
  type: typeof NodeType.TypeVarDef;
  name: string;
  constraints: TypeExpr[];
  bound?: TypeExpr;
}

export type ComparisonOperator = '<' | '>' | '<=' | '>=' | '==' | '!=';

export type ConditionOperand =
  | {kind: 'version'; parts: number[]}
  | {kind: 'name'; name: string};

export interface Condition {
  subject: string;
  operator: ComparisonOperator;
  operand: ConditionOperand;
}

export interface ConditionalBranch<T = Declaration> extends Node {
  type: typeof NodeType.ConditionalBranch;
  /** `null` for the trailing `else` branch. */
  condition: Condition | null;
  body: T[];
}

/**
 * An `if`/`elif`/`else` chain. Never part of a finished `Unit`: the chain is
 * resolved while parsing and only the selected branch's body survives.
 */
export interface ConditionalBlock<T = Declaration> extends Node {
  type: typeof NodeType.ConditionalBlock;
  branches: ConditionalBranch<T>[];
}

// Type expressions

export type TypeExpr =
  | NamedType
  | ClassType
  | TypeParameterType
  | GenericType
  | UnionType
  | AnythingType
  | NothingType
  | EllipsisType
  | NamedTupleType;

export interface NamedType extends Node {
  type: typeof NodeType.NamedType;
  name: string;
}

/** A reference to a class declared earlier in the same unit. */
export interface ClassType extends Node {
  type: typeof NodeType.ClassType;
  name: string;
}

/** A reference to a type variable declared earlier in the same unit. */
export interface TypeParameterType extends Node {
  type: typeof NodeType.TypeParameterType;
  name: string;
}

export interface GenericType extends Node {
  type: typeof NodeType.GenericType;
  base: NamedType | ClassType;
  parameters: TypeExpr[];
}

/** Binary and left-nested: `a or b or c` is `(a or b) or c`. */
export interface UnionType extends Node {
  type: typeof NodeType.UnionType;
  left: TypeExpr;
  right: TypeExpr;
}

export interface AnythingType extends Node {
  type: typeof NodeType.AnythingType;
}

export interface NothingType extends Node {
  type: typeof NodeType.NothingType;
}

export interface EllipsisType extends Node {
  type: typeof NodeType.EllipsisType;
}

export interface NamedTupleField {
  name: string;
  fieldType: TypeExpr;
}

export interface NamedTupleType extends Node {
  type: typeof NodeType.NamedTupleType;
  name: string;
  fields: NamedTupleField[];
}

/**
 * Thrown by the node factories below when asked to build a node that is not
 * structurally valid.
 */
export class NodeConstructionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NodeConstructionError';
  }
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const isDottedName = (name: string): boolean =>
  name.split('.').every((part) => IDENTIFIER.test(part));

export const createNamedType = (
  name: string,
  loc: SourceLocation,
): NamedType => {
  if (name === '') {
    throw new NodeConstructionError('Type name must not be empty.');
  }
  if (!isDottedName(name)) {
    throw new NodeConstructionError(`Invalid dotted name '${name}'.`);
  }
  return {type: NodeType.NamedType, name, loc};
};

export const createAnything = (loc: SourceLocation): AnythingType => ({
  type: NodeType.AnythingType,
  loc,
});

export const createNothing = (loc: SourceLocation): NothingType => ({
  type: NodeType.NothingType,
  loc,
});

export const createEllipsis = (loc: SourceLocation): EllipsisType => ({
  type: NodeType.EllipsisType,
  loc,
});

export const isTypeExpr = (node: Parent): node is TypeExpr =>
  node.type !== NodeType.KeywordParent;

/**
 * Renders a type expression the way it would be written in a stub. Used in
 * messages and handy in tests.
 */
export const printType = (t: TypeExpr): string => {
  switch (t.type) {
    case NodeType.NamedType:
    case NodeType.ClassType:
    case NodeType.TypeParameterType:
      return t.name;
    case NodeType.GenericType:
      return `${t.base.name}[${t.parameters.map(printType).join(', ')}]`;
    case NodeType.UnionType:
      return t.right.type === NodeType.UnionType
        ? `${printType(t.left)} or (${printType(t.right)})`
        : `${printType(t.left)} or ${printType(t.right)}`;
    case NodeType.AnythingType:
      return '?';
    case NodeType.NothingType:
      return 'nothing';
    case NodeType.EllipsisType:
      return '...';
    case NodeType.NamedTupleType:
      return `NamedTuple(${t.name}, [${t.fields
        .map((f) => `(${f.name}, ${printType(f.fieldType)})`)
        .join(', ')}])`;
  }
};
