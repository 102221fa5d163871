import { load } from 'cheerio';
import { prettifyHtml } from './prettify-html';

function prettify(source: string): string {
    const $ = load(source);
    return prettifyHtml($.root().contents().toArray(), (node) => $.html(node));
}

describe('prettifyHtml', () => {
    it('should put every node on its own line indented by depth', () => {
        const result = prettify(
            '<!DOCTYPE html><html><head><title>Hi</title></head><body><p>Hello <b>world</b></p></body></html>',
        );

        expect(result).toBe([
            '<!DOCTYPE html>',
            '<html>',
            ' <head>',
            '  <title>',
            '   Hi',
            '  </title>',
            ' </head>',
            ' <body>',
            '  <p>',
            '   Hello',
            '   <b>',
            '    world',
            '   </b>',
            '  </p>',
            ' </body>',
            '</html>',
        ].join('\n'));
    });

    it('should self-close void elements and keep verbatim content', () => {
        const result = prettify(
            '<html><head><link rel="stylesheet" href="a.css?x=1&amp;y=2"><script>if (a < b) {}</script></head>'
            + '<body><br><pre>  keep  me </pre><!-- note --></body></html>',
        );

        expect(result).toBe([
            '<html>',
            ' <head>',
            '  <link rel="stylesheet" href="a.css?x=1&amp;y=2"/>',
            '  <script>if (a < b) {}</script>',
            ' </head>',
            ' <body>',
            '  <br/>',
            '  <pre>  keep  me </pre>',
            '  <!-- note -->',
            ' </body>',
            '</html>',
        ].join('\n'));
    });

    it('should escape text and drop whitespace-only nodes', () => {
        const result = prettify('<html><head></head><body>\n  <p>a &lt; b</p>\n</body></html>');

        expect(result).toBe([
            '<html>',
            ' <head>',
            ' </head>',
            ' <body>',
            '  <p>',
            '   a &lt; b',
            '  </p>',
            ' </body>',
            '</html>',
        ].join('\n'));
    });

    it('should emit raw-text elements such as noscript unescaped', () => {
        const result = prettify(
            '<html><head><noscript><link rel="stylesheet" href="ns.css"></noscript></head>'
            + '<body><noscript><img src="pixel.gif" alt="a &amp; b"></noscript></body></html>',
        );

        expect(result).toBe([
            '<html>',
            ' <head>',
            '  <noscript><link rel="stylesheet" href="ns.css"></noscript>',
            ' </head>',
            ' <body>',
            '  <noscript><img src="pixel.gif" alt="a &amp; b"></noscript>',
            ' </body>',
            '</html>',
        ].join('\n'));
    });
});
