import { RequestMethod, ValidationPipe, VersioningType } from '@nestjs/common';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AssetArchiverService, PUBLIC_STATIC_PREFIX } from './asset-archiver.service';

/**
 * Routing shared by the server and the e2e tests: HTML pages at the root,
 * the JSON API under /api/v1, archived assets under /static.
 */
export function configureApp(app: NestExpressApplication): void {
    app.setGlobalPrefix('api', {
        exclude: [
            { path: '/', method: RequestMethod.GET },
            { path: 'scrape', method: RequestMethod.POST },
            { path: 'render', method: RequestMethod.GET },
            { path: 'render/:id', method: RequestMethod.GET },
        ],
    });

    // Enable URI versioning (e.g., /api/v1/pages)
    app.enableVersioning({
        type: VersioningType.URI,
        defaultVersion: '1',
    });

    app.useGlobalPipes(new ValidationPipe({
        transform: true,
        whitelist: true,
        forbidNonWhitelisted: true,
    }));

    app.useStaticAssets(app.get(AssetArchiverService).staticDir, {
        prefix: `${PUBLIC_STATIC_PREFIX}/`,
    });
}
