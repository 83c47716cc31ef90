export interface BlockRange {
    fromHeight: number;
    toHeight: number;
}

/**
 * Split the inclusive range [fromHeight, toHeight] into consecutive chunks of
 * at most `chunkSize` blocks. Chunks are strictly increasing with no overlap
 * and no gaps. An empty range yields no chunks.
 */
export function planChunks(fromHeight: number, toHeight: number, chunkSize: number): BlockRange[] {
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
        throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }

    const chunks: BlockRange[] = [];
    for (let start = fromHeight; start <= toHeight; start += chunkSize) {
        chunks.push({ fromHeight: start, toHeight: Math.min(start + chunkSize - 1, toHeight) });
    }
    return chunks;
}
