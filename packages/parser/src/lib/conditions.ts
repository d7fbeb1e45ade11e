import type {
  ComparisonOperator,
  Condition,
  ConditionalBlock,
} from './ast.js';

/**
 * What conditions are evaluated against. Version operands are compared with
 * `targetVersion`, name operands with `platform`.
 */
export interface ConditionEnvironment {
  targetVersion: readonly number[];
  platform: string;
}

/**
 * Lexicographic comparison of integer sequences, the shorter one padded with
 * zeros on the right, so `(3,)` equals `(3, 0, 0)`.
 */
export const compareVersions = (
  a: readonly number[],
  b: readonly number[],
): number => {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return 0;
};

const applyOperator = (op: ComparisonOperator, order: number): boolean => {
  switch (op) {
    case '<':
      return order < 0;
    case '>':
      return order > 0;
    case '<=':
      return order <= 0;
    case '>=':
      return order >= 0;
    case '==':
      return order === 0;
    case '!=':
      return order !== 0;
  }
};

export const isEqualityOperator = (op: ComparisonOperator): boolean =>
  op === '==' || op === '!=';

/**
 * Evaluates `subject op operand`. The subject names what is being tested and
 * does not take part in the comparison: whatever the name, a version tuple
 * operand is compared with the target version and a name operand with the
 * platform. Name operands only support equality; callers reject the rest
 * before evaluating.
 */
export const evaluateCondition = (
  condition: Condition,
  env: ConditionEnvironment,
): boolean => {
  const {operator, operand} = condition;
  if (operand.kind === 'version') {
    return applyOperator(
      operator,
      compareVersions(env.targetVersion, operand.parts),
    );
  }
  const equal = env.platform === operand.name;
  return operator === '!=' ? !equal : equal;
};

/**
 * Returns the index of the branch that wins, or -1 if none does.
 */
export const selectBranch = <T>(
  block: ConditionalBlock<T>,
  env: ConditionEnvironment,
): number =>
  block.branches.findIndex(
    (branch) =>
      branch.condition === null || evaluateCondition(branch.condition, env),
  );

/**
 * Static conditional compilation: the body of the first branch whose
 * condition holds (or of the `else` branch), or nothing.
 */
export const resolve = <T>(
  block: ConditionalBlock<T>,
  env: ConditionEnvironment,
): T[] => {
  const index = selectBranch(block, env);
  return index === -1 ? [] : block.branches[index].body;
};
