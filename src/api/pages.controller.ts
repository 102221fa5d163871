import { Body, Controller, Get, Logger, Param, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AppService } from '../app/app.service';
import { ScrapePageDto } from '../dto/scrape-page.dto';
import { PageResponseDto } from '../dto/page-response.dto';
import { PageEntity } from '../entities/page.entity';

export function toPageResponse(page: PageEntity): PageResponseDto {
    return {
        id: page.id,
        sourceUrl: page.sourceUrl,
        cssPaths: page.cssPaths,
        jsPaths: page.jsPaths,
        assetFailures: page.assetFailures,
        createdAt: page.createdAt,
    };
}

@Controller({ path: 'pages', version: '1' })
@ApiTags('Pages v1')
export class PagesController {
    private readonly logger = new Logger(PagesController.name);

    constructor(private readonly appService: AppService) { }

    @Post()
    @ApiOperation({ summary: 'Scrape a page and archive its stylesheets and scripts' })
    @ApiResponse({ status: 201, description: 'Page stored', type: PageResponseDto })
    @ApiResponse({ status: 400, description: 'Invalid URL, page could not be fetched, or URL already scraped' })
    async create(@Body() scrapePageDto: ScrapePageDto): Promise<PageResponseDto> {
        this.logger.log(`Received scrape request for ${scrapePageDto.url}`);
        const page = await this.appService.scrape(scrapePageDto.url);
        return toPageResponse(page);
    }

    @Get(':id')
    @ApiOperation({ summary: 'Get a stored page\'s archived assets' })
    @ApiResponse({ status: 200, description: 'Stored page', type: PageResponseDto })
    @ApiResponse({ status: 400, description: 'Malformed page ID' })
    @ApiResponse({ status: 404, description: 'Page not found' })
    async findOne(@Param('id') id: string): Promise<PageResponseDto> {
        const page = await this.appService.getPage(id);
        return toPageResponse(page);
    }
}
