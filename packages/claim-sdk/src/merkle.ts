import { bytesEqual, concatBytes, sha256 } from "./hash.js";

export type MerkleProof = {
  leaf: Uint8Array;
  leafIndex: number;
  treeSize: number;
  auditPath: Uint8Array[];
  root: Uint8Array;
};

function assertHash(hash: Uint8Array, what: string): void {
  if (hash.length !== 32) {
    throw new Error(`${what} must be a 32-byte hash`);
  }
}

function hashPair(left: Uint8Array, right: Uint8Array): Uint8Array {
  return sha256(concatBytes(left, right));
}

/** A last node without a sibling moves up unchanged. */
function parentLevel(level: Uint8Array[]): Uint8Array[] {
  const parents: Uint8Array[] = [];
  for (let i = 0; i < level.length; i += 2) {
    parents.push(i + 1 < level.length ? hashPair(level[i], level[i + 1]) : level[i]);
  }
  return parents;
}

export function emptyTreeRoot(): Uint8Array {
  return sha256(new Uint8Array(0));
}

export function computeMerkleRoot(leaves: readonly Uint8Array[]): Uint8Array {
  if (leaves.length === 0) return emptyTreeRoot();
  leaves.forEach((leaf) => assertHash(leaf, "Leaf"));

  let level = [...leaves];
  while (level.length > 1) {
    level = parentLevel(level);
  }
  return level[0];
}

export function buildMerkleProof(leaves: readonly Uint8Array[], leafIndex: number): MerkleProof {
  if (!Number.isInteger(leafIndex) || leafIndex < 0 || leafIndex >= leaves.length) {
    throw new RangeError(`Leaf index ${leafIndex} outside tree of ${leaves.length} leaves`);
  }
  leaves.forEach((leaf) => assertHash(leaf, "Leaf"));

  const auditPath: Uint8Array[] = [];
  let index = leafIndex;
  let level = [...leaves];

  while (level.length > 1) {
    const siblingIndex = index % 2 === 0 ? index + 1 : index - 1;
    if (siblingIndex < level.length) auditPath.push(level[siblingIndex]);
    level = parentLevel(level);
    index = Math.floor(index / 2);
  }

  return {
    leaf: leaves[leafIndex],
    leafIndex,
    treeSize: leaves.length,
    auditPath,
    root: level[0],
  };
}

/** Sibling hashes on the path from `leafIndex`; promoted levels contribute none. */
export function auditPathLength(treeSize: number, leafIndex: number): number {
  if (!Number.isInteger(treeSize) || treeSize < 0) {
    throw new Error("treeSize must be a non-negative integer");
  }

  let size = treeSize;
  let index = leafIndex;
  let len = 0;
  while (size > 1) {
    if (index % 2 === 1 || index + 1 < size) len += 1;
    index = Math.floor(index / 2);
    size = Math.ceil(size / 2);
  }
  return len;
}

/**
 * Recompute the root from `leaf` and its audit path. At each level the
 * running index and level size decide whether the node is a left child, a
 * right child or promoted without a sibling; every proof hash must be used.
 */
export function verifyMerkleProof(
  root: Uint8Array,
  proofHashes: readonly Uint8Array[],
  leaf: Uint8Array,
  leafIndex: number,
  treeSize: number
): boolean {
  if (root.length !== 32 || leaf.length !== 32) return false;
  if (!proofHashes.every((h) => h.length === 32)) return false;
  if (!Number.isSafeInteger(treeSize) || treeSize <= 0) return false;
  if (!Number.isSafeInteger(leafIndex) || leafIndex < 0 || leafIndex >= treeSize) return false;

  let current = leaf;
  let index = leafIndex;
  let size = treeSize;
  let used = 0;

  while (size > 1) {
    const isRight = index % 2 === 1;
    if (isRight || index + 1 < size) {
      if (used >= proofHashes.length) return false;
      const sibling = proofHashes[used];
      used += 1;
      current = isRight ? hashPair(sibling, current) : hashPair(current, sibling);
    }
    index = Math.floor(index / 2);
    size = Math.ceil(size / 2);
  }

  return used === proofHashes.length && bytesEqual(current, root);
}
