import {
    ArrayMaxSize,
    ArrayNotEmpty,
    IsArray,
    IsBoolean,
    IsInt,
    IsNumber,
    IsOptional,
    IsString,
    Max,
    Min,
} from 'class-validator'
import {
    MAX_CONCURRENCY_LIMIT,
    MAX_TIMEOUT_SECONDS,
    MAX_URLS_PER_REQUEST,
    MIN_TIMEOUT_SECONDS,
} from '../../common/constants'
import { IsHttpUrl } from './is-http-url.validator'

export class FetchRequestDto {
    @IsArray()
    @ArrayNotEmpty()
    @ArrayMaxSize(MAX_URLS_PER_REQUEST)
    @IsString({ each: true })
    @IsHttpUrl({ each: true })
    urls!: string[]

    /** Seconds, applied to every URL independently. */
    @IsOptional()
    @IsNumber({ allowNaN: false, allowInfinity: false })
    @Min(MIN_TIMEOUT_SECONDS)
    @Max(MAX_TIMEOUT_SECONDS)
    timeout?: number

    @IsOptional()
    @IsInt()
    @Min(1)
    @Max(MAX_CONCURRENCY_LIMIT)
    concurrency?: number

    @IsOptional()
    @IsBoolean()
    to_markdown?: boolean
}
