import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
  Res,
  UseGuards,
} from '@nestjs/common';
import { Response } from 'express';
import { AnalysisError, AnalysisJob, InputRef } from '../../../domain';
import { AnalysisOrchestrator } from '../../../application';
import { Principal } from '../../identity';
import {
  AnalysisJobListResponseDto,
  AnalysisJobResponseDto,
  CreateAnalysisDto,
  ListAnalysesQueryDto,
} from '../dto';
import { ApiTokenGuard, CurrentPrincipal } from '../guards';
import { jobErrorToHttp, toHttpException } from '../http-errors';

export type HttpResponse = Pick<Response, 'status' | 'once' | 'removeListener' | 'writableFinished'>;

export function parseRepository(
  dto: Pick<CreateAnalysisDto, 'repositoryUrl' | 'repository' | 'path' | 'revision'>,
): InputRef {
  const repository = (dto.repositoryUrl || dto.repository || '').trim();
  if (!repository) {
    throw new Error('Either repositoryUrl or repository is required');
  }
  return InputRef.isGitHubUrl(repository)
    ? InputRef.fromGitHubUrl(repository, dto.path, dto.revision)
    : InputRef.fromFullName(repository, dto.path, dto.revision);
}

@Controller('analyses')
@UseGuards(ApiTokenGuard)
export class AnalysesController {
  constructor(private readonly orchestrator: AnalysisOrchestrator) {}

  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  async create(
    @Body() dto: CreateAnalysisDto,
    @Res({ passthrough: true }) res: HttpResponse,
    @CurrentPrincipal() principal?: Principal,
    @Query('wait') wait?: string,
  ): Promise<AnalysisJobResponseDto> {
    let inputRef: InputRef;
    try {
      inputRef = parseRepository(dto);
    } catch (error) {
      throw new BadRequestException(error instanceof Error ? error.message : 'Invalid repository');
    }

    const shouldWait = wait === 'true' || wait === '1';
    const disconnect = shouldWait ? this.cancelOnDisconnect(res) : null;
    try {
      const { job, isExisting } = await this.orchestrator.submit(dto.kind, inputRef, {
        requestedBy: principal && !principal.anonymous ? principal.id : null,
        signal: disconnect?.signal,
      });
      if (isExisting) {
        res.status(HttpStatus.OK);
      }
      if (!shouldWait) {
        return this.toResponse(job);
      }

      const finished = await this.orchestrator.waitFor(job.id);
      if (finished.error) {
        throw jobErrorToHttp(finished.error);
      }
      res.status(HttpStatus.OK);
      return this.toDetailedResponse(finished);
    } catch (error) {
      throw toHttpException(error);
    } finally {
      disconnect?.dispose();
    }
  }

  @Get()
  async findAll(@Query() query: ListAnalysesQueryDto): Promise<AnalysisJobListResponseDto> {
    const jobs = await this.orchestrator.list({
      kind: query.kind,
      status: query.status,
      limit: query.limit,
    });
    return {
      jobs: jobs.map((job) => this.toResponse(job)),
      total: jobs.length,
    };
  }

  @Get(':id')
  async findOne(@Param('id') id: string): Promise<AnalysisJobResponseDto> {
    try {
      const job = await this.orchestrator.getStatus(id);
      return await this.toDetailedResponse(job);
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async cancel(@Param('id') id: string): Promise<void> {
    try {
      await this.orchestrator.cancel(id);
    } catch (error) {
      throw toHttpException(error);
    }
  }

  private cancelOnDisconnect(res: HttpResponse): { signal: AbortSignal; dispose: () => void } {
    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableFinished) {
        controller.abort(AnalysisError.cancelled('Client disconnected'));
      }
    };
    res.once('close', onClose);
    return { signal: controller.signal, dispose: () => res.removeListener('close', onClose) };
  }

  private async toDetailedResponse(job: AnalysisJob): Promise<AnalysisJobResponseDto> {
    if (!job.isAggregate) {
      return this.toResponse(job);
    }
    const { children } = await this.orchestrator.getAggregate(job.id);
    return {
      ...this.toResponse(job),
      children: children.map((child) => this.toResponse(child)),
    };
  }

  private toResponse(job: AnalysisJob): AnalysisJobResponseDto {
    return {
      id: job.id,
      kind: job.kind,
      repository: job.inputRef.fullName,
      path: job.inputRef.path,
      revision: job.inputRef.revision,
      status: job.status.value,
      result: job.result,
      error: job.error,
      parentId: job.parentId,
      childIds: [...job.childIds],
      attempts: job.attempts,
      requestedBy: job.requestedBy,
      createdAt: job.createdAt,
      updatedAt: job.updatedAt,
    };
  }
}
