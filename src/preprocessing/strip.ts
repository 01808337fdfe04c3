import * as cheerio from "cheerio";
import { normalizeWhitespace } from "../utils/shared";

// Elements that never carry transcript text
const REMOVE_ELEMENTS = [
    "script",
    "style",
    "link",
    "img",
    "iframe",
    "video",
    "audio",
    "object",
    "embed",
    "noscript",
    "svg",
    "canvas",
    "button",
    "input",
    "select",
    "textarea",
    "form",
];

// Page chrome around the transcript
const BOILERPLATE_ELEMENTS = ["nav", "footer", "aside", "header"];

// Elements whose text forms one line of output
const BLOCK_SELECTOR = "h1, h2, h3, h4, h5, h6, p, li, blockquote, pre, td, dd, dt";

/**
 * Extract the readable text of an HTML transcript, one block per line.
 * Falls back to the whole body text when the page has no block elements.
 */
export function htmlToText(html: string): string {
    const $ = cheerio.load(html);

    $([...REMOVE_ELEMENTS, ...BOILERPLATE_ELEMENTS].join(", ")).remove();

    const main = $("main, article, [role='main']").first();
    const root = main.length > 0 ? main : $("body");

    const lines: string[] = [];
    root.find(BLOCK_SELECTOR).each((_, el) => {
        const $el = $(el);
        // Nested blocks (li > p) are emitted by the innermost element
        if ($el.find(BLOCK_SELECTOR).length > 0) return;
        const text = normalizeWhitespace($el.text());
        if (text.length > 0) {
            lines.push(text);
        }
    });

    if (lines.length === 0) {
        return normalizeWhitespace(root.text());
    }
    return lines.join("\n");
}
