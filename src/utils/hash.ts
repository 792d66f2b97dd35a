import { createHash } from 'crypto';

/** 32-bit FNV-1a. Stable across processes, cheap enough for per-request keys. */
export function fnv1a(input: string): number {
    let hash = 0x811c9dc5;
    for (let i = 0; i < input.length; i++) {
        hash ^= input.charCodeAt(i);
        hash = Math.imul(hash, 0x01000193);
    }
    return hash >>> 0;
}

/** First 32 bits of an md5 digest; spreads similar inputs evenly around a hash ring. */
export function ringHash(input: string): number {
    return createHash('md5').update(input).digest().readUInt32BE(0);
}
