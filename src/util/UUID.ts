export default class UUID {
  private static readonly UUID_REGEX = /^[a-f0-9]{32}$/;

  static normalize(uuid: string): string {
    return uuid.toLowerCase().replaceAll('-', '');
  }

  static looksLikeUuid(uuid: string): boolean {
    return this.UUID_REGEX.test(this.normalize(uuid));
  }

  /**
   * Same value as `java.util.UUID#hashCode()`, but unsigned.
   *
   * The UUID is split into two 64-bit words, the upper and lower halves of each word are XORed
   * and the two results are XORed again. As XOR is commutative, this is the XOR of all four 32-bit words.
   */
  static javaHashCode(uuid: string): number {
    if (!this.looksLikeUuid(uuid)) {
      throw new Error(`Invalid UUID ${JSON.stringify(uuid)}`);
    }

    const normalized = this.normalize(uuid);
    let hash = 0;
    for (let i = 0; i < 32; i += 8) {
      hash ^= parseInt(normalized.substring(i, i + 8), 16);
    }
    return hash >>> 0;
  }
}
