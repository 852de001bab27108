import { Marked } from 'marked';

const HTML_ENTITIES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
};

export function escapeTelegramHtml(text: string): string {
    return text.replace(/[&<>"]/g, (char) => HTML_ENTITIES[char] ?? char);
}

// Text and inline code arrive escaped from the lexer; code blocks only when `escaped` is set.
const telegramMarked = new Marked({
    gfm: true,
    breaks: false,
    renderer: {
        code(code, infostring, escaped) {
            const body = escaped ? code : escapeTelegramHtml(code.replace(/\n$/, ''));
            const language = (infostring ?? '').match(/^\S+/)?.[0];
            return language
                ? `<pre><code class="language-${escapeTelegramHtml(language)}">${body}</code></pre>\n`
                : `<pre>${body}</pre>\n`;
        },
        blockquote(quote) {
            return `<blockquote>${quote.trim()}</blockquote>\n`;
        },
        html(html) {
            return escapeTelegramHtml(html);
        },
        heading(text) {
            return `<b>${text}</b>\n\n`;
        },
        hr() {
            return '\n';
        },
        list(body) {
            return `${body}\n`;
        },
        listitem(text) {
            return `• ${text.trim()}\n`;
        },
        checkbox(checked) {
            return checked ? '☑ ' : '☐ ';
        },
        paragraph(text) {
            return `${text}\n`;
        },
        table(header, body) {
            return `${header}${body}\n`;
        },
        tablerow(content) {
            return `${content.trimEnd()}\n`;
        },
        tablecell(content) {
            return `${content} `;
        },
        strong(text) {
            return `<b>${text}</b>`;
        },
        em(text) {
            return `<i>${text}</i>`;
        },
        codespan(text) {
            return `<code>${text}</code>`;
        },
        br() {
            return '\n';
        },
        del(text) {
            return `<s>${text}</s>`;
        },
        link(href, _title, text) {
            return `<a href="${escapeTelegramHtml(href)}">${text}</a>`;
        },
        image(href, _title, text) {
            return `<a href="${escapeTelegramHtml(href)}">${text || href}</a>`;
        },
    },
});

/**
 * Render Markdown into the HTML subset the Bot API accepts under
 * `parse_mode: 'HTML'` (b, i, s, a, code, pre, blockquote). Headings become bold
 * lines, lists become bullet lines, images become links and raw HTML is shown
 * as text.
 */
export function markdownToTelegramHtml(markdown: string): string {
    const html = telegramMarked.parse(markdown, { async: false });
    if (typeof html !== 'string') {
        throw new Error('[TelegramHtml] Markdown renderer returned a promise.');
    }
    return html.trimEnd();
}
