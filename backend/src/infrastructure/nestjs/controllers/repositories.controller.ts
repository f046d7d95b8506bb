import { BadRequestException, Body, Controller, Get, HttpCode, HttpStatus, Param, Post, Query, UseGuards } from '@nestjs/common';
import { InputRef } from '../../../domain';
import { RepositoryService } from '../../../application';
import {
  CreateIssueDto,
  CreateIssueFromAnalysisDto,
  IssueResponseDto,
  ListRepositoriesQueryDto,
  RepositoryContentQueryDto,
  RepositoryContentResponseDto,
  RepositoryListResponseDto,
} from '../dto';
import { ApiTokenGuard } from '../guards';
import { toHttpException } from '../http-errors';
import { parseRepository } from './analyses.controller';

function parseOrBadRequest(dto: Parameters<typeof parseRepository>[0]): InputRef {
  try {
    return parseRepository(dto);
  } catch (error) {
    throw new BadRequestException(error instanceof Error ? error.message : 'Invalid repository');
  }
}

@Controller()
@UseGuards(ApiTokenGuard)
export class RepositoriesController {
  constructor(private readonly repositories: RepositoryService) {}

  @Get('repositories')
  async findAll(@Query() query: ListRepositoriesQueryDto): Promise<RepositoryListResponseDto> {
    try {
      const repositories = await this.repositories.listUserRepositories(query.username);
      return { repositories, total: repositories.length };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Get('repositories/content')
  async content(@Query() query: RepositoryContentQueryDto): Promise<RepositoryContentResponseDto> {
    const inputRef = parseOrBadRequest(query);
    try {
      const entries = await this.repositories.listContents(inputRef);
      return { repository: inputRef.fullName, path: inputRef.path, entries };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Post('issues')
  @HttpCode(HttpStatus.CREATED)
  async createIssue(@Body() dto: CreateIssueDto): Promise<IssueResponseDto> {
    const inputRef = parseOrBadRequest(dto);
    try {
      return await this.repositories.createIssue(inputRef, {
        title: dto.title,
        body: dto.body,
        labels: dto.labels,
      });
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Post('analyses/:id/issue')
  @HttpCode(HttpStatus.CREATED)
  async createIssueFromAnalysis(
    @Param('id') id: string,
    @Body() dto: CreateIssueFromAnalysisDto,
  ): Promise<IssueResponseDto> {
    try {
      return await this.repositories.createIssueFromAnalysis(id, { title: dto.title, labels: dto.labels });
    } catch (error) {
      throw toHttpException(error);
    }
  }
}
