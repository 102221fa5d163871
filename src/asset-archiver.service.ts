import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, rm, writeFile } from 'fs/promises';
import { join, posix } from 'path';
import { AssetFetcherService } from './asset-fetcher.service';
import { AssetKind } from './enums/asset-kind.enum';
import { ArchiveResult, AssetFailure } from './interfaces/page.interface';
import { resolveUrl } from './utils/url-resolver';

interface AssetLayout {
    directory: string;
    prefix: string;
    extension: string;
}

const LAYOUTS: Record<AssetKind, AssetLayout> = {
    [AssetKind.STYLESHEET]: { directory: 'css', prefix: 'style', extension: 'css' },
    [AssetKind.SCRIPT]: { directory: 'js', prefix: 'script', extension: 'js' },
};

export const PUBLIC_STATIC_PREFIX = '/static';

type AssetOutcome =
    | { ok: true; path: string }
    | { ok: false; failure: AssetFailure };

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

@Injectable()
export class AssetArchiverService implements OnModuleInit {
    private readonly logger = new Logger(AssetArchiverService.name);
    readonly staticDir: string;

    constructor(
        private readonly assetFetcher: AssetFetcherService,
        private readonly configService: ConfigService,
    ) {
        this.staticDir = this.configService.get<string>('STATIC_DIR', 'static');
    }

    async onModuleInit() {
        await this.ensureDirectories();
    }

    async ensureDirectories(): Promise<void> {
        for (const layout of Object.values(LAYOUTS)) {
            await mkdir(join(this.staticDir, layout.directory), { recursive: true });
        }
    }

    /**
     * Fetches every reference and writes the successful ones under the page's
     * namespace. Indices follow discovery order, so a failed asset leaves a gap
     * in the file names but never shifts the ones after it.
     */
    async archive(pageId: string, kind: AssetKind, pageUrl: string, references: string[]): Promise<ArchiveResult> {
        const outcomes = await Promise.all(
            references.map((reference, index) => this.archiveOne(pageId, kind, pageUrl, reference, index)),
        );

        const paths: string[] = [];
        const failures: AssetFailure[] = [];
        for (const outcome of outcomes) {
            if (outcome.ok) {
                paths.push(outcome.path);
            } else {
                failures.push(outcome.failure);
                this.logger.warn(
                    `[${pageId}] Skipped ${kind} #${outcome.failure.index} (${outcome.failure.reference}): ${outcome.failure.reason}`,
                );
            }
        }

        return { paths, failures };
    }

    /**
     * Removes previously archived files by their public path. Files that are
     * already gone are ignored.
     */
    async discard(publicPaths: string[]): Promise<void> {
        await Promise.all(publicPaths.map((publicPath) => rm(this.toLocalPath(publicPath), { force: true })));
    }

    fileName(pageId: string, kind: AssetKind, index: number): string {
        const { prefix, extension } = LAYOUTS[kind];
        return `${pageId}_${prefix}_${index}.${extension}`;
    }

    private async archiveOne(
        pageId: string,
        kind: AssetKind,
        pageUrl: string,
        reference: string,
        index: number,
    ): Promise<AssetOutcome> {
        let url: string;
        try {
            url = resolveUrl(pageUrl, reference);
        } catch (error: unknown) {
            return { ok: false, failure: { kind, index, reference, reason: describeError(error) } };
        }

        try {
            const { body } = await this.assetFetcher.fetch(url);
            const { directory } = LAYOUTS[kind];
            const fileName = this.fileName(pageId, kind, index);

            await writeFile(join(this.staticDir, directory, fileName), body);
            this.logger.debug(`[${pageId}] Archived ${url} as ${fileName}`);

            return { ok: true, path: posix.join(PUBLIC_STATIC_PREFIX, directory, fileName) };
        } catch (error: unknown) {
            return { ok: false, failure: { kind, index, reference, url, reason: describeError(error) } };
        }
    }

    private toLocalPath(publicPath: string): string {
        const relative = posix.relative(PUBLIC_STATIC_PREFIX, publicPath);
        return join(this.staticDir, ...relative.split('/'));
    }
}
