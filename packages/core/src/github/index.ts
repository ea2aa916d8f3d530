export type { Octokit } from '@octokit/rest';
export { GitHubApiError, isOctokitRequestError, mapOctokitError } from './github_errors';
export type { GitHubApiErrorCode } from './github_errors';
