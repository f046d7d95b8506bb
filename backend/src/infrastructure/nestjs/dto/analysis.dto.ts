import { Type } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Matches,
  Max,
  MaxLength,
  Min,
  ValidateIf,
} from 'class-validator';
import {
  ANALYSIS_KINDS,
  AnalysisKind,
  JOB_STATUS_VALUES,
  JobError,
  JobResult,
  JobStatusValue,
} from '../../../domain';

export class CreateAnalysisDto {
  @IsIn(ANALYSIS_KINDS)
  kind!: AnalysisKind;

  @ValidateIf((dto: CreateAnalysisDto) => !dto.repository)
  @IsUrl({ protocols: ['http', 'https'], require_protocol: true })
  @MaxLength(300)
  repositoryUrl?: string;

  /** owner/repo, or a repository URL */
  @ValidateIf((dto: CreateAnalysisDto) => !dto.repositoryUrl)
  @IsString()
  @IsNotEmpty()
  @MaxLength(300)
  repository?: string;

  @IsString()
  @IsOptional()
  @MaxLength(1024)
  path?: string;

  @IsString()
  @IsOptional()
  @Matches(/^[\w./-]+$/, { message: 'revision must be a branch, tag or commit sha' })
  @MaxLength(255)
  revision?: string;
}

export class ListAnalysesQueryDto {
  @IsIn(ANALYSIS_KINDS)
  @IsOptional()
  kind?: AnalysisKind;

  @IsIn(JOB_STATUS_VALUES)
  @IsOptional()
  status?: JobStatusValue;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(500)
  @IsOptional()
  limit?: number;
}

export class AnalysisJobResponseDto {
  id!: string;
  kind!: AnalysisKind;
  repository!: string;
  path!: string;
  revision!: string | null;
  status!: JobStatusValue;
  result!: JobResult | null;
  error!: JobError | null;
  parentId!: string | null;
  childIds!: string[];
  attempts!: number;
  requestedBy!: string | null;
  createdAt!: Date;
  updatedAt!: Date;
  children?: AnalysisJobResponseDto[];
}

export class AnalysisJobListResponseDto {
  jobs!: AnalysisJobResponseDto[];
  total!: number;
}
