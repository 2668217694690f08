import { logger } from './logger';

const TRACKING_PARAMS = [
    'utm_source',
    'utm_medium',
    'utm_campaign',
    'utm_term',
    'utm_content',
    'gclid',
    'fbclid',
    'igshid',
    '_ga',
    'mc_cid',
    'mc_eid',
];

/**
 * Canonicalize URL: remove tracking params, ensure HTTPS, drop the fragment
 * and any trailing slash. Used as an identity key, not for requests.
 */
export function canonicalizeUrl(rawUrl: string): string {
    try {
        const url = new URL(rawUrl.trim());

        if (url.protocol === 'http:') {
            url.protocol = 'https:';
        }

        TRACKING_PARAMS.forEach((param) => url.searchParams.delete(param));
        url.hash = '';

        if (url.pathname !== '/' && url.pathname.endsWith('/')) {
            url.pathname = url.pathname.slice(0, -1);
        }

        return url.toString();
    } catch {
        logger.debug('Failed to canonicalize URL', { rawUrl });
        return rawUrl.trim();
    }
}
