const NUMERIC_TOKEN = /\d+/g;

/**
 * True when any three-digit code in an upstream status field is a 5xx.
 *
 * nginx lists one code per upstream tried (`502, 200` or `502 : 200`), and
 * writes `-` when no upstream answered. Other tokens are skipped.
 */
export function isServerError(status: string | undefined): boolean {
    if (!status) return false;

    for (const token of status.match(NUMERIC_TOKEN) ?? []) {
        if (token.length !== 3) continue;

        const code = Number.parseInt(token, 10);
        if (code >= 500 && code < 600) return true;
    }

    return false;
}
