import { ApiProperty } from '@nestjs/swagger';
import { AssetKind } from '../enums/asset-kind.enum';

class AssetFailureDto {
    @ApiProperty({ enum: AssetKind, example: AssetKind.STYLESHEET })
    kind!: AssetKind;

    @ApiProperty({
        description: 'Position of the asset among the page\'s stylesheets or scripts',
        example: 1
    })
    index!: number;

    @ApiProperty({
        description: 'Reference as written in the page',
        example: 'theme/print.css'
    })
    reference!: string;

    @ApiProperty({
        description: 'Absolute URL the reference resolved to',
        example: 'https://example.com/docs/theme/print.css',
        required: false
    })
    url?: string;

    @ApiProperty({
        description: 'Why the asset was not archived',
        example: 'Request failed with status code 404'
    })
    reason!: string;
}

export class PageResponseDto {
    @ApiProperty({
        description: 'UUID of the stored page',
        example: '123e4567-e89b-12d3-a456-426614174000'
    })
    id!: string;

    @ApiProperty({
        description: 'URL the page was scraped from',
        example: 'https://example.com/docs/index.html'
    })
    sourceUrl!: string;

    @ApiProperty({
        description: 'Public paths of the archived stylesheets, in document order',
        example: ['/static/css/123e4567-e89b-12d3-a456-426614174000_style_0.css'],
        type: [String]
    })
    cssPaths!: string[];

    @ApiProperty({
        description: 'Public paths of the archived scripts, in document order',
        example: ['/static/js/123e4567-e89b-12d3-a456-426614174000_script_0.js'],
        type: [String]
    })
    jsPaths!: string[];

    @ApiProperty({
        description: 'Assets that were referenced but could not be archived',
        type: [AssetFailureDto]
    })
    assetFailures!: AssetFailureDto[];

    @ApiProperty({
        description: 'When the page was stored',
        example: '2026-01-15T10:00:00.000Z'
    })
    createdAt!: Date;
}
