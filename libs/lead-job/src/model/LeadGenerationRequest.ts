import { Transform } from 'class-transformer';
import {
  IsBoolean,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';

export const MIN_COMPANY_COUNT = 1;
export const MAX_COMPANY_COUNT = 50;

const trim = ({ value }: { value: unknown }) =>
  typeof value === 'string' ? value.trim() : value;

export class LeadGenerationRequest {
  @Transform(trim)
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  industry!: string;

  @IsInt()
  @Min(MIN_COMPANY_COUNT)
  @Max(MAX_COMPANY_COUNT)
  count!: number;

  @Transform(trim)
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  country!: string;

  @IsOptional()
  @IsBoolean()
  enableWebScraping?: boolean;
}

export interface LeadGenerationParams {
  readonly industry: string;
  readonly count: number;
  readonly country: string;
  readonly enableWebScraping: boolean;
}

export type LeadGenerationInput = {
  industry: string;
  count: number;
  country: string;
  enableWebScraping?: boolean;
};
