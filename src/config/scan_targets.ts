/**
 * One instrument for the REST scanner, with its two outcome token ids
 */
export interface ScanTarget {
    instrumentId: string;
    yesTokenId: string;
    noTokenId: string;
}

/**
 * Parse `instrumentId:yesTokenId:noTokenId` entries; malformed entries are returned separately
 */
export function parseScanTargets(entries: readonly string[]): { targets: ScanTarget[]; invalid: string[] } {
    const targets: ScanTarget[] = [];
    const invalid: string[] = [];

    for (const entry of entries) {
        const parts = entry.split(':').map(part => part.trim());
        const [instrumentId, yesTokenId, noTokenId] = parts;

        if (parts.length !== 3 || !instrumentId || !yesTokenId || !noTokenId) {
            invalid.push(entry);
            continue;
        }

        targets.push({ instrumentId, yesTokenId, noTokenId });
    }

    return { targets, invalid };
}
