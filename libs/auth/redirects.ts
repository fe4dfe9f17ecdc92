/**
 * Post-authentication redirect targets.
 * A `next` target is honoured only when it stays on this site or on the
 * configured domain and its subdomains. Whitespace and control characters
 * are refused anywhere in the target (`/\t/host` resolves as `//host`).
 */

export interface RedirectTargets {
    readonly success: string;
    readonly failure: string;
}

const UNSAFE_CHARACTER = /[\u0000-\u0020\u007f]/;

export function isAllowedRedirect(next: string, domain: string): boolean {
    if (UNSAFE_CHARACTER.test(next)) {
        return false;
    }

    if (next.startsWith('/')) {
        return !next.startsWith('//') && !next.startsWith('/\\');
    }

    let url: URL;
    try {
        url = new URL(next);
    } catch {
        return false;
    }

    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        return false;
    }

    const host = url.hostname.toLowerCase();
    const allowed = domain.trim().toLowerCase();
    return allowed.length > 0 && (host === allowed || host.endsWith(`.${allowed}`));
}

export function resolveRedirects(failurePath: string, next: string | null | undefined, domain: string): RedirectTargets {
    if (next && isAllowedRedirect(next, domain)) {
        return {
            success: next,
            failure: `${failurePath}?next=${encodeURIComponent(next)}`
        };
    }
    return { success: '/', failure: failurePath };
}
