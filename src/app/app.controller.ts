import { Body, Controller, Get, Header, HttpStatus, Logger, Param, Post, Query, Redirect, VERSION_NEUTRAL } from '@nestjs/common';
import { ApiExcludeController } from '@nestjs/swagger';
import { AppService } from './app.service';
import { ScrapePageDto } from '../dto/scrape-page.dto';
import { renderHomePage, renderStoredPage } from '../templates/pages.template';

const HTML = 'text/html; charset=utf-8';

@Controller({ version: VERSION_NEUTRAL })
@ApiExcludeController()
export class AppController {
    private readonly logger = new Logger(AppController.name);

    constructor(private readonly appService: AppService) { }

    @Get()
    @Header('Content-Type', HTML)
    home(): string {
        return renderHomePage();
    }

    @Post('scrape')
    @Redirect(undefined, HttpStatus.SEE_OTHER)
    async scrape(@Body() scrapePageDto: ScrapePageDto): Promise<{ url: string }> {
        this.logger.log(`Received scrape request for ${scrapePageDto.url}`);
        const page = await this.appService.scrape(scrapePageDto.url);
        return { url: `/render/${page.id}` };
    }

    @Get('render')
    @Header('Content-Type', HTML)
    renderByQuery(@Query('template_id') templateId: string): Promise<string> {
        return this.render(templateId);
    }

    @Get('render/:id')
    @Header('Content-Type', HTML)
    renderById(@Param('id') id: string): Promise<string> {
        return this.render(id);
    }

    private async render(id: string): Promise<string> {
        this.logger.log(`Rendering page ${id}`);
        const page = await this.appService.getRenderablePage(id);
        return renderStoredPage(page);
    }
}
