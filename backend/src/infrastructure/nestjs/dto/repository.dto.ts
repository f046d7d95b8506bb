import {
  ArrayMaxSize,
  IsArray,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Matches,
  MaxLength,
  ValidateIf,
} from 'class-validator';
import { ContentEntry, CreatedIssue, RepositorySummary } from '../../github/IHostingClient';

export class ListRepositoriesQueryDto {
  @IsString()
  @IsNotEmpty()
  @Matches(/^[a-zA-Z0-9-]+$/, { message: 'username must be a GitHub login' })
  @MaxLength(39)
  username!: string;
}

export class RepositoryContentQueryDto {
  @ValidateIf((dto: RepositoryContentQueryDto) => !dto.repository)
  @IsUrl({ protocols: ['http', 'https'], require_protocol: true })
  @MaxLength(300)
  repositoryUrl?: string;

  @ValidateIf((dto: RepositoryContentQueryDto) => !dto.repositoryUrl)
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

export class CreateIssueDto {
  @ValidateIf((dto: CreateIssueDto) => !dto.repository)
  @IsUrl({ protocols: ['http', 'https'], require_protocol: true })
  @MaxLength(300)
  repositoryUrl?: string;

  @ValidateIf((dto: CreateIssueDto) => !dto.repositoryUrl)
  @IsString()
  @IsNotEmpty()
  @MaxLength(300)
  repository?: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(256)
  title!: string;

  @IsString()
  @MaxLength(65536)
  body!: string;

  @IsArray()
  @ArrayMaxSize(20)
  @IsString({ each: true })
  @IsOptional()
  labels?: string[];
}

export class CreateIssueFromAnalysisDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(256)
  @IsOptional()
  title?: string;

  @IsArray()
  @ArrayMaxSize(20)
  @IsString({ each: true })
  @IsOptional()
  labels?: string[];
}

export class RepositoryListResponseDto {
  repositories!: RepositorySummary[];
  total!: number;
}

export class RepositoryContentResponseDto {
  repository!: string;
  path!: string;
  entries!: ContentEntry[];
}

export type IssueResponseDto = CreatedIssue;
