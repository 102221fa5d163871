import { Injectable } from '@nestjs/common';
import { loadBuffer } from 'cheerio';
import { ExtractedPage, FetchedResource } from './interfaces/page.interface';
import { prettifyHtml } from './utils/prettify-html';

@Injectable()
export class HtmlExtractorService {
    /**
     * Parses a fetched page and lists the stylesheets and scripts it references,
     * in document order. The returned HTML keeps the original references.
     *
     * The body is decoded from a byte order mark, then the transport charset,
     * then a `<meta charset>` declaration, falling back to UTF-8.
     */
    extract(source: FetchedResource): ExtractedPage {
        const $ = loadBuffer(source.body, {
            encoding: {
                transportLayerEncodingLabel: source.charset,
                defaultEncoding: 'utf-8',
            },
        });

        const stylesheetHrefs: string[] = [];
        $('link[rel]').each((_, element) => {
            const rel = ($(element).attr('rel') ?? '').toLowerCase().split(/\s+/);
            const href = ($(element).attr('href') ?? '').trim();
            if (rel.includes('stylesheet') && href) {
                stylesheetHrefs.push(href);
            }
        });

        const scriptSrcs: string[] = [];
        $('script[src]').each((_, element) => {
            const src = ($(element).attr('src') ?? '').trim();
            if (src) {
                scriptSrcs.push(src);
            }
        });

        const html = prettifyHtml($.root().contents().toArray(), (node) => $.html(node));

        return { html, stylesheetHrefs, scriptSrcs };
    }
}
