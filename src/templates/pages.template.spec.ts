import { escapeHtml, renderStoredPage } from './pages.template';

describe('pages templates', () => {
    describe('escapeHtml', () => {
        it('should escape markup and quotes', () => {
            expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;');
        });
    });

    describe('renderStoredPage', () => {
        it('should place stylesheets in the head and scripts after the stored HTML', () => {
            const html = renderStoredPage({
                html: '<div>\n stored\n</div>',
                cssPaths: ['/static/css/a_style_0.css', '/static/css/a_style_2.css'],
                jsPaths: ['/static/js/a_script_0.js'],
            });

            expect(html).toContain([
                '  <link rel="stylesheet" href="/static/css/a_style_0.css">',
                '  <link rel="stylesheet" href="/static/css/a_style_2.css">',
                '</head>',
                '<body>',
                '<div>\n stored\n</div>',
                '  <script src="/static/js/a_script_0.js"></script>',
                '</body>',
            ].join('\n'));
        });

        it('should escape asset paths', () => {
            const html = renderStoredPage({ html: '', cssPaths: ['/static/css/"x".css'], jsPaths: [] });

            expect(html).toContain('href="/static/css/&quot;x&quot;.css"');
        });
    });
});
