import 'reflect-metadata';
import { plainToInstance, Transform, Type } from 'class-transformer';
import { IsBoolean, IsInt, IsOptional, IsString, Min, validateSync } from 'class-validator';

const TRUTHY = new Set(['true', '1', 'yes']);

export class EnvironmentVariables {
    @IsOptional()
    @IsString()
    DATABASE_URL?: string;

    @IsOptional()
    @Transform(({ value }) => (typeof value === 'string' ? TRUTHY.has(value.trim().toLowerCase()) : value))
    @IsBoolean()
    DB_SYNCHRONIZE?: boolean;

    @IsOptional()
    @IsString()
    STATIC_DIR?: string;

    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(0)
    FETCH_TIMEOUT?: number;

    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(0)
    FETCH_MAX_REDIRECTS?: number;

    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(1)
    PORT?: number;

    @IsOptional()
    @IsString()
    CORS_ORIGIN?: string;
}

export function validate(config: Record<string, unknown>): EnvironmentVariables {
    const validated = plainToInstance(EnvironmentVariables, config);
    const errors = validateSync(validated, { skipMissingProperties: false });

    if (errors.length > 0) {
        throw new Error(errors.map((error) => error.toString()).join('\n'));
    }
    return validated;
}
