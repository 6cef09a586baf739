/**
 * URL helpers shared by scoring, discovery, extraction and dedup.
 * Nothing here throws: upstream HTML is untrusted, so malformed input
 * comes back unchanged (or empty) instead.
 */
export class UrlNormalizer {
    /** Prepends `https://` when the string carries no scheme. */
    static normalize(url: string): string {
        const trimmed = url.trim();
        if (!trimmed) return '';
        return /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
    }

    /**
     * Reduces a URL to `scheme://host[:port]`. Scheme and host come back
     * lowercased; anything that does not parse as http(s) is returned as given.
     */
    static clean(url: string): string {
        const original = url;
        let candidate = url.trim();
        if (!candidate) return original;

        if (/^mailto:/i.test(candidate)) {
            candidate = candidate.slice('mailto:'.length);
        }

        if (!/^[a-z][a-z0-9+.-]*:\/\//i.test(candidate)) {
            // bare domain such as "acme.it/home"
            if (!candidate.includes('.') || /\s/.test(candidate)) return original;
            candidate = `http://${candidate}`;
        }

        try {
            const parsed = new URL(candidate);
            if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return original;
            if (!parsed.host) return original;
            return `${parsed.protocol}//${parsed.host}`;
        } catch {
            return original;
        }
    }

    /** Host without `www.`, lowercased; empty when the URL has no host. */
    static extractDomain(url: string): string {
        const host = this.hostOf(url);
        return host.replace(/^www\./, '');
    }

    /** Same site once port and `www.` are ignored. */
    static isSameDomain(a: string, b: string): boolean {
        const hostA = this.extractDomain(a).replace(/:\d+$/, '');
        const hostB = this.extractDomain(b).replace(/:\d+$/, '');
        return hostA !== '' && hostA === hostB;
    }

    /**
     * Site component of a dedup key: the cleaned URL with scheme and `www.`
     * dropped, so http/https and apex/www variants collapse.
     */
    static keySite(url: string): string {
        const cleaned = this.clean(url).toLowerCase().replace(/\/+$/, '');
        return cleaned.replace(/^https?:\/\//, '').replace(/^www\./, '');
    }

    /** Residual map-redirect links that do not point at the company site. */
    static isMapArtifact(url: string): boolean {
        const lower = url.toLowerCase();
        return lower.includes('google.com') || lower.includes('google.it');
    }

    static rootOf(url: string): string | null {
        try {
            const parsed = new URL(this.normalize(url));
            if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return null;
            return `${parsed.protocol}//${parsed.host}/`;
        } catch {
            return null;
        }
    }

    private static hostOf(url: string): string {
        try {
            return new URL(this.normalize(url)).host.toLowerCase();
        } catch {
            return '';
        }
    }
}
