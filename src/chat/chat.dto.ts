import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsBoolean,
  IsEnum,
  IsOptional,
  IsString,
  MinLength,
} from 'class-validator';
import { PrivacyMode } from '../agents/agent.types';

export class ChatTurnDto {
  @ApiPropertyOptional({ description: 'Generated when omitted' })
  @IsOptional()
  @IsString()
  @MinLength(1)
  sessionId?: string;

  @ApiProperty()
  @IsString()
  @MinLength(1)
  userId!: string;

  @ApiProperty()
  @IsString()
  @MinLength(1)
  message!: string;

  @ApiPropertyOptional({ enum: PrivacyMode, default: PrivacyMode.NORMAL })
  @IsOptional()
  @IsEnum(PrivacyMode)
  privacyMode?: PrivacyMode;

  @ApiPropertyOptional({ description: 'Memory profile; "default" when omitted' })
  @IsOptional()
  @IsString()
  @MinLength(1)
  profileId?: string;

  @ApiPropertyOptional({ description: 'Run the conversation analyst on this turn' })
  @IsOptional()
  @IsBoolean()
  analyze?: boolean;
}
