/**
 * 256-entry byte permutation driving the audio keystream.
 *
 * Built from the per-file raw key with an RC4-style key schedule: identity
 * table, then one pass of `j = j + box[i] + key[i % len]` followed by a swap.
 * Instances are immutable; build a fresh one per container.
 */
export class KeyBox {
  public static readonly SIZE = 256;

  private constructor(private readonly table: Uint8Array) {}

  /**
   * Run the key schedule over `rawKey`.
   * @throws {RangeError} if the key is empty.
   */
  static fromKey(rawKey: Uint8Array): KeyBox {
    if (rawKey.length === 0) throw new RangeError('Key schedule needs a non-empty key');

    const box = new Uint8Array(KeyBox.SIZE);
    for (let i = 0; i < KeyBox.SIZE; i++) box[i] = i;

    let j = 0;
    for (let i = 0; i < KeyBox.SIZE; i++) {
      const swap = box[i];
      j = (j + swap + rawKey[i % rawKey.length]) & 0xff;
      box[i] = box[j];
      box[j] = swap;
    }
    return new KeyBox(box);
  }

  /**
   * Wrap a precomputed table.
   * @throws {RangeError} unless `table` is a permutation of 0..255.
   */
  static fromTable(table: ArrayLike<number>): KeyBox {
    if (table.length !== KeyBox.SIZE) {
      throw new RangeError(`Key box must have ${KeyBox.SIZE} entries, got ${table.length}`);
    }
    const seen = new Uint8Array(KeyBox.SIZE);
    const box  = new Uint8Array(KeyBox.SIZE);
    for (let i = 0; i < KeyBox.SIZE; i++) {
      const v = table[i];
      if (!Number.isInteger(v) || v < 0 || v > 0xff || seen[v]) {
        throw new RangeError(`Key box is not a permutation of 0..255 (index ${i})`);
      }
      seen[v] = 1;
      box[i]  = v;
    }
    return new KeyBox(box);
  }

  at(index: number): number {
    return this.table[index & 0xff];
  }

  toArray(): number[] {
    return Array.from(this.table);
  }
}
