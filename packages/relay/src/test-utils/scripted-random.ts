import { IDENTITY_ALPHABET } from "../identity-allocator.js";

/**
 * Random source that spells out the given identities in order. Once the
 * script runs out it keeps returning the index of the final character.
 */
export function scriptedRandomIndex(
  identities: readonly string[],
  alphabet: string = IDENTITY_ALPHABET
): (max: number) => number {
  const indexes: number[] = [];
  for (const id of identities) {
    for (const char of id) {
      const index = alphabet.indexOf(char);
      if (index < 0) {
        throw new Error(`Character '${char}' is not in the identity alphabet`);
      }
      indexes.push(index);
    }
  }
  let cursor = 0;
  return () => {
    const value = indexes[Math.min(cursor, indexes.length - 1)] ?? 0;
    cursor++;
    return value;
  };
}
