/**
 * produce - draft-based updates on immutable collections
 *
 * The recipe mutates a draft; the result is a new collection sharing every
 * untouched subtree with the base, or the base itself when nothing changed.
 */

export interface Producible<D, R> {
  produce(recipe: (draft: D) => void): R;
}

export function produce<D, R>(base: Producible<D, R>, recipe: (draft: D) => void): R {
  return base.produce(recipe);
}
