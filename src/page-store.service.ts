import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { isUUID } from 'class-validator';
import { v4 as uuidv4 } from 'uuid';
import { PageEntity } from './entities/page.entity';
import { NewPageRecord } from './interfaces/page.interface';
import { DuplicateUrlException, InvalidPageIdException, PageNotFoundException } from './errors/page.exceptions';

// Postgres unique constraint violation
const UNIQUE_VIOLATION = '23505';

function isUniqueViolation(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === UNIQUE_VIOLATION;
}

@Injectable()
export class PageStoreService {
    private readonly logger = new Logger(PageStoreService.name);

    constructor(
        @InjectRepository(PageEntity) private readonly pageRepository: Repository<PageEntity>,
    ) { }

    allocateId(): string {
        return uuidv4();
    }

    /**
     * Inserts the record, relying on the unique index over sourceUrl instead of
     * a prior lookup: of two concurrent scrapes of one URL only the first wins.
     */
    async insertIfAbsent(record: NewPageRecord): Promise<PageEntity> {
        const page = this.pageRepository.create(record);

        try {
            await this.pageRepository.insert(page);
        } catch (error: unknown) {
            if (isUniqueViolation(error)) {
                this.logger.warn(`[${record.id}] Rejected duplicate URL ${record.sourceUrl}`);
                throw new DuplicateUrlException();
            }
            throw error;
        }

        this.logger.log(`[${page.id}] Stored ${page.sourceUrl}`);
        return page;
    }

    async findById(id: string): Promise<PageEntity> {
        if (!isUUID(id)) {
            throw new InvalidPageIdException();
        }

        const page = await this.pageRepository.findOne({ where: { id } });
        if (!page) {
            throw new PageNotFoundException();
        }

        return page;
    }
}
