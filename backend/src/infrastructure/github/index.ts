export {
  IHostingClient,
  HOSTING_CLIENT,
  ExternalFetchResult,
  ContentEntry,
  RepositorySummary,
  IssueDraft,
  CreatedIssue,
} from './IHostingClient';
export { GitHubHostingClient, GitHubClientOptions, GitHubApi, octokitApi } from './GitHubHostingClient';
