import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsArray,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  MinLength,
} from 'class-validator';
import type { MemoryType } from './memory.types';

const MEMORY_TYPES: MemoryType[] = [
  'fact',
  'preference',
  'event',
  'relationship',
  'other',
];

export class MemoryAddDto {
  @ApiProperty()
  @IsString()
  @MinLength(1)
  userId!: string;

  @ApiPropertyOptional({ description: 'Defaults to the "default" profile' })
  @IsOptional()
  @IsString()
  profileId?: string;

  @ApiProperty()
  @IsString()
  @MinLength(1)
  text!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  source?: string;

  @ApiPropertyOptional({ enum: MEMORY_TYPES })
  @IsOptional()
  @IsIn(MEMORY_TYPES)
  type?: MemoryType;

  @ApiPropertyOptional({ minimum: 0, maximum: 1 })
  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  importance?: number;

  @ApiPropertyOptional({ type: [String] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  tags?: string[];
}

export class MemorySearchDto {
  @ApiProperty()
  @IsString()
  @MinLength(1)
  userId!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  profileId?: string;

  @ApiProperty()
  @IsString()
  @MinLength(1)
  query!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsInt()
  @Min(1)
  topK?: number;
}
