import { BadRequestException, ConflictException, HttpException, NotFoundException } from '@nestjs/common';
import { AnalysisError } from '../../../domain/errors/AnalysisError';
import { AnalysisJob } from '../../../domain/entities/AnalysisJob';
import { InputRef } from '../../../domain/value-objects/InputRef';
import { JobStatus } from '../../../domain/value-objects/JobStatus';
import { JobNotFoundError } from '../../../application/errors';
import { RepositoryService } from '../../../application/services/RepositoryService';
import {
  ContentEntry,
  CreatedIssue,
  ExternalFetchResult,
  IssueDraft,
  RepositorySummary,
} from '../../github/IHostingClient';
import { RepositoriesController } from './repositories.controller';

const ISSUE: CreatedIssue = {
  id: 7,
  number: 3,
  title: 'Crash on empty input',
  state: 'open',
  url: 'https://github.com/acme/widgets/issues/3',
};

const ENTRIES: ContentEntry[] = [
  { name: 'app.ts', path: 'src/app.ts', type: 'file', size: 120, url: 'https://github.com/acme/widgets/blob/main/src/app.ts' },
  { name: 'lib', path: 'src/lib', type: 'dir', size: 0, url: null },
];

describe('RepositoriesController', () => {
  let listContents: jest.Mock<Promise<ContentEntry[]>, [InputRef]>;
  let listUserRepositories: jest.Mock<Promise<RepositorySummary[]>, [string]>;
  let createIssue: jest.Mock<Promise<CreatedIssue>, [InputRef, IssueDraft]>;
  let getStatus: jest.Mock<Promise<AnalysisJob>, [string]>;
  let controller: RepositoriesController;

  beforeEach(() => {
    listContents = jest.fn<Promise<ContentEntry[]>, [InputRef]>(async () => ENTRIES);
    listUserRepositories = jest.fn<Promise<RepositorySummary[]>, [string]>(async () => []);
    createIssue = jest.fn<Promise<CreatedIssue>, [InputRef, IssueDraft]>(async () => ISSUE);
    getStatus = jest.fn<Promise<AnalysisJob>, [string]>();
    const service = new RepositoryService(
      {
        fetchArtifact: jest.fn<Promise<ExternalFetchResult>, []>(),
        listContents,
        listUserRepositories,
        createIssue,
      },
      { getStatus },
    );
    controller = new RepositoriesController(service);
  });

  describe('findAll', () => {
    it('should list the user\'s repositories with a total', async () => {
      const repo: RepositorySummary = {
        name: 'widgets',
        fullName: 'acme/widgets',
        description: 'Widget toolkit',
        url: 'https://github.com/acme/widgets',
        language: null,
        stars: 0,
        forks: 0,
      };
      listUserRepositories.mockResolvedValue([repo]);

      await expect(controller.findAll({ username: 'acme' })).resolves.toEqual({ repositories: [repo], total: 1 });
      expect(listUserRepositories).toHaveBeenCalledWith('acme');
    });

    it('should map an unknown user to 404', async () => {
      listUserRepositories.mockRejectedValue(new AnalysisError('NotFound', 'Not found on GitHub: user nobody'));

      let thrown: unknown;
      try {
        await controller.findAll({ username: 'nobody' });
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(HttpException);
      if (thrown instanceof HttpException) {
        expect(thrown.getStatus()).toBe(404);
        expect(thrown.getResponse()).toEqual({
          statusCode: 404,
          kind: 'NotFound',
          message: 'Not found on GitHub: user nobody',
          retryable: false,
        });
      }
    });
  });

  describe('content', () => {
    it('should list entries at a path of a repository URL', async () => {
      const body = await controller.content({ repositoryUrl: 'https://github.com/acme/widgets', path: 'src/' });

      expect(body).toEqual({ repository: 'acme/widgets', path: 'src', entries: ENTRIES });
      const [inputRef] = listContents.mock.calls[0];
      expect(inputRef.key).toBe('acme/widgets:src');
    });

    it('should pass the revision through', async () => {
      await controller.content({ repository: 'acme/widgets', revision: 'v1.2.0' });

      const [inputRef] = listContents.mock.calls[0];
      expect(inputRef.revision).toBe('v1.2.0');
      expect(inputRef.path).toBe('');
    });

    it('should reject a malformed repository', async () => {
      await expect(controller.content({ repository: 'widgets' })).rejects.toThrow(BadRequestException);
      expect(listContents).not.toHaveBeenCalled();
    });
  });

  describe('createIssue', () => {
    it('should open an issue with the given fields', async () => {
      const issue = await controller.createIssue({
        repository: 'acme/widgets',
        title: 'Crash on empty input',
        body: 'Steps to reproduce',
        labels: ['bug'],
      });

      expect(issue).toEqual(ISSUE);
      const [inputRef, draft] = createIssue.mock.calls[0];
      expect(inputRef.fullName).toBe('acme/widgets');
      expect(draft).toEqual({ title: 'Crash on empty input', body: 'Steps to reproduce', labels: ['bug'] });
    });

    it('should reject a request without a repository', async () => {
      await expect(controller.createIssue({ title: 'Crash', body: '' })).rejects.toThrow(
        'Either repositoryUrl or repository is required',
      );
    });

    it('should map a denied request to 403', async () => {
      createIssue.mockRejectedValue(
        new AnalysisError('AuthFailure', 'GitHub denied access to acme/widgets issues: Requires authentication'),
      );

      let thrown: unknown;
      try {
        await controller.createIssue({ repository: 'acme/widgets', title: 'Crash', body: '' });
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(HttpException);
      if (thrown instanceof HttpException) {
        expect(thrown.getStatus()).toBe(403);
      }
    });
  });

  describe('createIssueFromAnalysis', () => {
    it('should file a succeeded analysis', async () => {
      getStatus.mockResolvedValue(
        AnalysisJob.reconstitute({
          id: 'job-1',
          kind: 'code-review',
          inputRef: InputRef.fromFullName('acme/widgets'),
          status: JobStatus.succeeded(),
          result: { summary: 'Tidy', sections: {}, findings: [] },
        }),
      );

      await expect(controller.createIssueFromAnalysis('job-1', {})).resolves.toEqual(ISSUE);
      const [, draft] = createIssue.mock.calls[0];
      expect(draft.title).toBe('Code review: 0 findings in acme/widgets');
    });

    it('should answer 409 for a job still running', async () => {
      getStatus.mockResolvedValue(
        AnalysisJob.create({ kind: 'code-review', inputRef: InputRef.fromFullName('acme/widgets') }),
      );

      await expect(controller.createIssueFromAnalysis('job-1', {})).rejects.toThrow(ConflictException);
    });

    it('should answer 404 for an unknown job', async () => {
      getStatus.mockRejectedValue(new JobNotFoundError('missing'));

      await expect(controller.createIssueFromAnalysis('missing', {})).rejects.toThrow(NotFoundException);
    });
  });
});
