// Ordered accumulation helpers shared by the list-shaped productions.
// Each returns the list it was given (or a new one) so calls can chain.

export const startList = <T>(item: T): T[] => [item];

export const appendList = <T>(list: T[], item: T): T[] => {
  list.push(item);
  return list;
};

/** Moves every item of `src` onto the end of `dst`, preserving order. */
export const extendList = <T>(dst: T[], src: readonly T[]): T[] => {
  for (const item of src) {
    dst.push(item);
  }
  return dst;
};
