import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, IsUrl } from 'class-validator';

export class ScrapePageDto {
  @ApiProperty({
    description: 'HTTP/HTTPS URL of the page to archive (protocol required)',
    example: 'https://example.com/docs/index.html',
  })
  @IsString()
  @IsNotEmpty({ message: 'url is required' })
  @IsUrl({
    protocols: ['http', 'https'],
    require_protocol: true,
    require_valid_protocol: true,
    require_tld: false
  }, {
    message: 'url must be a valid HTTP or HTTPS URL with protocol (e.g., https://example.com)'
  })
  url!: string;
}
