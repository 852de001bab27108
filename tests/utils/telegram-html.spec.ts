import { describe, it, expect } from 'vitest';
import { escapeTelegramHtml, markdownToTelegramHtml } from '../../src/utils/telegram-html.js';

describe('markdownToTelegramHtml', () => {
    it('maps inline emphasis onto the tags Telegram accepts', () => {
        expect(markdownToTelegramHtml('A **bold** _soft_ ~~gone~~ `x<y` step')).toBe(
            'A <b>bold</b> <i>soft</i> <s>gone</s> <code>x&lt;y</code> step',
        );
    });

    it('keeps the language of a fenced block and escapes its body', () => {
        expect(markdownToTelegramHtml('```ts\nif (a < b) {}\n```')).toBe(
            '<pre><code class="language-ts">if (a &lt; b) {}</code></pre>',
        );
    });

    it('turns headings into bold lines and list items into bullets', () => {
        expect(markdownToTelegramHtml('# Plan\n\n- one\n- two')).toBe('<b>Plan</b>\n\n• one\n• two');
    });

    it('shows raw HTML and bare entities as text', () => {
        expect(markdownToTelegramHtml('Use <br> & more')).toBe('Use &lt;br&gt; &amp; more');
    });

    it('escapes the target of a link', () => {
        expect(markdownToTelegramHtml('[docs](https://example.com/?a=1&b=2)')).toBe(
            '<a href="https://example.com/?a=1&amp;b=2">docs</a>',
        );
    });
});

describe('escapeTelegramHtml', () => {
    it('escapes the characters the HTML parse mode reserves', () => {
        expect(escapeTelegramHtml('<a href="x">&</a>')).toBe('&lt;a href=&quot;x&quot;&gt;&amp;&lt;/a&gt;');
    });
});
