import {
  ArrayMaxSize,
  IsArray,
  IsBoolean,
  IsIn,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
} from 'class-validator';
import { ActionPriority } from '../analysis-result.interface';

export const ACTION_PRIORITIES: readonly ActionPriority[] = ['low', 'medium', 'high', 'critical'];

/** Shape the models are asked to answer with (see the analysis prompt). */
export class AnalysisPayloadDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(1000)
  summary!: string;

  @IsArray()
  @ArrayMaxSize(10)
  @IsString({ each: true })
  themes!: string[];

  @IsBoolean()
  is_actionable!: boolean;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  action_suggestion?: string;

  @IsOptional()
  @IsIn(ACTION_PRIORITIES)
  priority?: ActionPriority;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  confidence?: number;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  insights?: string[];
}
