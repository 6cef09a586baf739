// Labels and icon glyphs that Maps listings prepend to address/phone text.
const LABEL_PREFIXES = ['Indirizzo:', 'Address:', 'Telefono:', 'Phone:', 'Tel:', 'Website:', 'Sito web:'];
const ICON_GLYPHS = /[\uE0C8\uE0B0]/g;

export class TextCleaner {
    static clean(value: string | null | undefined): string {
        if (!value) return '';
        let text = value.replace(ICON_GLYPHS, '');
        for (const prefix of LABEL_PREFIXES) {
            text = text.split(prefix).join('');
        }
        text = text.replace(/\s+/g, ' ').trim();
        return text.replace(/^[\s,.:;-]+/, '');
    }

    /** Lowercased, whitespace-collapsed text for keyword matching. */
    static forMatching(value: string): string {
        return value.toLowerCase().replace(/\s+/g, ' ').trim();
    }
}
