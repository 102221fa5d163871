import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { Logger } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import helmet from 'helmet';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap() {
    const app = await NestFactory.create<NestExpressApplication>(AppModule, {
        logger: ['error', 'warn', 'log', 'debug', 'verbose'],
        bufferLogs: true,
    });

    const configService = app.get(ConfigService);
    const logger = new Logger('Bootstrap');

    // Rendered pages pull scripts, styles and images from their original hosts
    app.use(helmet({ contentSecurityPolicy: false }));

    app.enableCors({
        origin: configService.get<string>('CORS_ORIGIN') || '*',
        methods: 'GET,HEAD,POST',
    });

    configureApp(app);

    app.enableShutdownHooks();

    const config = new DocumentBuilder()
        .setTitle('Page Archiver')
        .setDescription('API to archive web pages with their stylesheets and scripts')
        .setVersion('1.0')
        .addTag('Pages v1')
        .build();
    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup('docs', app, document);

    const port = configService.get<number>('PORT') || 3000;
    await app.listen(port);

    logger.log(`🚀 Application is running on: http://localhost:${port}`);
    logger.log(`📑 Swagger is available at: http://localhost:${port}/docs`);
}

bootstrap().catch((error: unknown) => {
    new Logger('Bootstrap').error('Failed to start', error instanceof Error ? error.stack : String(error));
    process.exit(1);
});
