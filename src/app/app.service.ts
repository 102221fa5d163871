import { Injectable, Logger } from '@nestjs/common';
import { AssetFetcherService } from '../asset-fetcher.service';
import { AssetArchiverService } from '../asset-archiver.service';
import { HtmlExtractorService } from '../html-extractor.service';
import { PageStoreService } from '../page-store.service';
import { PageEntity } from '../entities/page.entity';
import { AssetKind } from '../enums/asset-kind.enum';
import { FetchFailedError } from '../errors/fetch-failed.error';
import { FetchFailedException } from '../errors/page.exceptions';
import { FetchedResource, RenderablePage } from '../interfaces/page.interface';

@Injectable()
export class AppService {
    private readonly logger = new Logger(AppService.name);

    constructor(
        private readonly assetFetcher: AssetFetcherService,
        private readonly htmlExtractor: HtmlExtractorService,
        private readonly assetArchiver: AssetArchiverService,
        private readonly pageStore: PageStoreService,
    ) { }

    /**
     * Fetches the page, archives its stylesheets and scripts, and stores the
     * result. Assets that cannot be archived are left out of the record and
     * listed in its assetFailures.
     */
    async scrape(url: string): Promise<PageEntity> {
        // 1. Fetch the page itself; nothing else happens if this fails
        let source: FetchedResource;
        try {
            source = await this.assetFetcher.fetch(url);
        } catch (error: unknown) {
            if (error instanceof FetchFailedError) {
                this.logger.warn(`Failed to fetch ${url}: ${error.message}`);
                throw new FetchFailedException(error.message);
            }
            throw error;
        }

        // 2. Extract
        const extracted = this.htmlExtractor.extract(source);
        const id = this.pageStore.allocateId();

        this.logger.log(
            `[${id}] Scraping ${url}: ${extracted.stylesheetHrefs.length} stylesheets, ${extracted.scriptSrcs.length} scripts`,
        );

        // 3. Archive, stylesheets then scripts
        const css = await this.assetArchiver.archive(id, AssetKind.STYLESHEET, url, extracted.stylesheetHrefs);
        const js = await this.assetArchiver.archive(id, AssetKind.SCRIPT, url, extracted.scriptSrcs);

        // 4. Insert; a rejected record leaves no files behind
        try {
            return await this.pageStore.insertIfAbsent({
                id,
                sourceUrl: url,
                html: extracted.html,
                cssPaths: css.paths,
                jsPaths: js.paths,
                assetFailures: [...css.failures, ...js.failures],
            });
        } catch (error: unknown) {
            await this.assetArchiver.discard([...css.paths, ...js.paths]);
            throw error;
        }
    }

    async getPage(id: string): Promise<PageEntity> {
        return this.pageStore.findById(id);
    }

    async getRenderablePage(id: string): Promise<RenderablePage> {
        const page = await this.pageStore.findById(id);
        return {
            html: page.html,
            cssPaths: page.cssPaths,
            jsPaths: page.jsPaths,
        };
    }
}
