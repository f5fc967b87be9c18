const C1 = 0xcc9e2d51;
const C2 = 0x1b873593;

const scrambleBlock = (block: number): number => {
  let k = Math.imul(block, C1);
  k = (k << 15) | (k >>> 17);
  return Math.imul(k, C2);
};

const finalMix = (hash: number): number => {
  let h = hash;
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
};

const byteAt = (key: string, index: number): number =>
  key.charCodeAt(index) & 0xff;

/** 32-bit murmur3 over the low byte of each UTF-16 code unit. */
export const murmurHash3 = (key: string, seed = 0): number => {
  const tail = key.length % 4;
  const blockEnd = key.length - tail;
  let hash = seed;

  for (let offset = 0; offset < blockEnd; offset += 4) {
    const block =
      byteAt(key, offset) |
      (byteAt(key, offset + 1) << 8) |
      (byteAt(key, offset + 2) << 16) |
      (byteAt(key, offset + 3) << 24);
    hash ^= scrambleBlock(block);
    hash = (hash << 13) | (hash >>> 19);
    hash = Math.imul(hash, 5) + 0xe6546b64;
  }

  if (tail > 0) {
    let remaining = 0;
    for (let i = tail - 1; i >= 0; i -= 1) {
      remaining ^= byteAt(key, blockEnd + i) << (8 * i);
    }
    hash ^= scrambleBlock(remaining);
  }

  return finalMix(hash ^ key.length);
};
