import type { AnyNode, Cheerio, CheerioAPI } from 'cheerio';

const STRIPPED_TAGS = 'script, style, iframe, noscript';

/**
 * Text of a selection with a space between every text node, so that
 * `<p>info@acme.it</p><p>Tel</p>` does not fuse into one token.
 */
export function spacedText<T extends AnyNode>(selection: Cheerio<T>): string {
    const parts: string[] = [];
    selection
        .find('*')
        .addBack()
        .contents()
        .each((_, node) => {
            if (node.nodeType === 3 && 'data' in node && typeof node.data === 'string') {
                parts.push(node.data);
            }
        });
    return parts.join(' ').replace(/\s+/g, ' ').trim();
}

/** Visible page text: scripts, styles, iframes and noscript blocks removed. */
export function visibleText($: CheerioAPI): string {
    $(STRIPPED_TAGS).remove();
    return spacedText($.root());
}
