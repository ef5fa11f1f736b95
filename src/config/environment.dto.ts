import { Type } from 'class-transformer';
import { IsIn, IsInt, IsNumber, IsOptional, IsString, IsUrl, Matches, Max, Min } from 'class-validator';
import { BACKEND_NAMES, MOCK_MODES, SELECTION_STRATEGIES } from '../backends/constants/backend.constants';

const BACKEND_LIST = /^\s*[a-z]+(\s*,\s*[a-z]+)*\s*$/;

export class EnvironmentVariables {
  @IsOptional()
  @IsString()
  NODE_ENV?: string;

  @IsOptional()
  @Matches(BACKEND_LIST, { message: 'AVAILABLE_BACKENDS must be a comma-separated list of backend names' })
  AVAILABLE_BACKENDS?: string;

  @IsOptional()
  @IsIn(BACKEND_NAMES)
  PRIMARY_BACKEND?: string;

  // An empty value disables the fallback backend.
  @IsOptional()
  @IsIn([...BACKEND_NAMES, ''])
  SECONDARY_BACKEND?: string;

  @IsOptional()
  @IsIn(SELECTION_STRATEGIES)
  BACKEND_SELECTION_STRATEGY?: string;

  @IsOptional()
  @IsString()
  OPENAI_API_KEY?: string;

  @IsOptional()
  @IsUrl({ require_tld: false, require_protocol: true })
  OPENAI_BASE_URL?: string;

  @IsOptional()
  @IsString()
  OPENAI_MODEL?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  OPENAI_MAX_TOKENS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @Max(2)
  OPENAI_TEMPERATURE?: number;

  @IsOptional()
  @IsUrl({ require_tld: false, require_protocol: true })
  OLLAMA_BASE_URL?: string;

  @IsOptional()
  @IsString()
  OLLAMA_MODEL?: string;

  @IsOptional()
  @IsIn(MOCK_MODES)
  MOCK_MODE?: string;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0.1)
  @Max(600)
  BACKEND_TIMEOUT_OPENAI?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0.1)
  @Max(600)
  BACKEND_TIMEOUT_OLLAMA?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0.1)
  @Max(600)
  BACKEND_TIMEOUT_MOCK?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  RATE_LIMIT_BACKOFF_MS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  ANALYSIS_QUEUE_CAPACITY?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  ANALYSIS_SHUTDOWN_GRACE_MS?: number;
}
