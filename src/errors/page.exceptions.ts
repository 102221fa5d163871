import { BadRequestException, NotFoundException } from '@nestjs/common';

export class FetchFailedException extends BadRequestException {
    constructor(reason: string) {
        super(`Failed to fetch the URL: ${reason}`);
    }
}

export class DuplicateUrlException extends BadRequestException {
    constructor() {
        super('This URL has already been scraped.');
    }
}

export class InvalidPageIdException extends BadRequestException {
    constructor() {
        super('Invalid template ID.');
    }
}

export class PageNotFoundException extends NotFoundException {
    constructor() {
        super('Template not found.');
    }
}
