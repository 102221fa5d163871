import { Test, TestingModule } from '@nestjs/testing';
import { PagesController } from './pages.controller';
import { AppService } from '../app/app.service';
import { AssetKind } from '../enums/asset-kind.enum';

describe('PagesController', () => {
    let controller: PagesController;
    let mockAppService: { scrape: jest.Mock; getPage: jest.Mock };

    const createdAt = new Date('2026-01-15T10:00:00.000Z');
    const page = {
        id: 'page-1',
        sourceUrl: 'https://example.com/',
        html: '<p>stored</p>',
        cssPaths: ['/static/css/page-1_style_0.css'],
        jsPaths: [],
        assetFailures: [{ kind: AssetKind.SCRIPT, index: 0, reference: 'gone.js', reason: 'Request failed with status code 404' }],
        createdAt,
    };
    const expected = {
        id: 'page-1',
        sourceUrl: 'https://example.com/',
        cssPaths: ['/static/css/page-1_style_0.css'],
        jsPaths: [],
        assetFailures: [{ kind: AssetKind.SCRIPT, index: 0, reference: 'gone.js', reason: 'Request failed with status code 404' }],
        createdAt,
    };

    beforeEach(async () => {
        mockAppService = {
            scrape: jest.fn().mockResolvedValue(page),
            getPage: jest.fn().mockResolvedValue(page),
        };

        const module: TestingModule = await Test.createTestingModule({
            controllers: [PagesController],
            providers: [
                {
                    provide: AppService,
                    useValue: mockAppService,
                },
            ],
        }).compile();

        controller = module.get<PagesController>(PagesController);
    });

    it('should be defined', () => {
        expect(controller).toBeDefined();
    });

    describe('create', () => {
        it('should scrape and return the stored page without its HTML', async () => {
            const result = await controller.create({ url: 'https://example.com/' });

            expect(mockAppService.scrape).toHaveBeenCalledWith('https://example.com/');
            expect(result).toEqual(expected);
        });
    });

    describe('findOne', () => {
        it('should return the stored page', async () => {
            const result = await controller.findOne('page-1');

            expect(mockAppService.getPage).toHaveBeenCalledWith('page-1');
            expect(result).toEqual(expected);
        });
    });
});
