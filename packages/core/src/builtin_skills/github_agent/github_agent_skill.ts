/**
 * github_agent - repository analysis, issue and pull request management
 * through the GitHub REST API (Octokit).
 *
 * Token lookup: `token` parameter, then the `github_token` credential
 * (session context, global context, GITHUB_TOKEN). Failures come back in
 * the result as `{ error, code? }`.
 */

import { Octokit } from '@octokit/rest';
import type { Skill, SkillContext, SkillDefinition, SkillParams } from '../../skill_registry';
import type { JsonObject, JsonValue } from '../../types';
import { mapOctokitError } from '../../github';
import { errorMessage, readString, readStringArray } from '../param_readers';

export const GITHUB_TOKEN_CREDENTIAL = 'github_token';
export const LIST_LIMIT = 20;
export const RECENT_COMMITS = 10;

const ISSUE_STATES = ['open', 'closed', 'all'] as const;
type IssueState = (typeof ISSUE_STATES)[number];

export type RepoRef = {
  owner: string;
  repo: string;
};

export type OctokitFactory = (token: string) => Octokit;

export type GitHubAgentSkillOptions = {
  createClient?: OctokitFactory;
};

type Label = string | { name?: string | null };

function isIssueState(value: string): value is IssueState {
  return ISSUE_STATES.some((state) => state === value);
}

function readState(params: SkillParams): string {
  return readString(params, 'state') ?? 'open';
}

function invalidState(state: string): JsonObject {
  return { error: `Invalid state '${state}': expected open, closed or all` };
}

function labelName(label: Label): string {
  return typeof label === 'string' ? label : label.name ?? '';
}

/**
 * Parses `owner/name`.
 */
export function parseRepo(value: string): RepoRef | null {
  const match = /^([\w.-]+)\/([\w.-]+)$/.exec(value.trim());
  if (!match?.[1] || !match[2]) {
    return null;
  }
  return { owner: match[1], repo: match[2] };
}

/**
 * Total item count of a list endpoint queried with `per_page=1`: the page
 * number of the `rel="last"` link, or the size of the only page.
 */
export function countFromLinkHeader(link: string | undefined, pageLength: number): number {
  const match = link ? /[?&]page=(\d+)[^>]*>;\s*rel="last"/.exec(link) : null;
  return match?.[1] ? Number(match[1]) : pageLength;
}

class GitHubAgentSkill implements Skill {
  private readonly context: SkillContext;
  private readonly createClient: OctokitFactory;
  private client: { token: string; octokit: Octokit } | null = null;

  constructor(context: SkillContext, createClient: OctokitFactory) {
    this.context = context;
    this.createClient = createClient;
  }

  async execute(params: SkillParams): Promise<JsonValue> {
    const action = readString(params, 'action') ?? '';
    const octokit = await this.resolveClient(params);
    if (!octokit) {
      return {
        error: `Failed to initialize GitHub client: no token found (pass token or set ${GITHUB_TOKEN_CREDENTIAL})`,
      };
    }

    const repoParam = readString(params, 'repo');
    if (!repoParam) {
      return { error: 'No repository specified' };
    }
    const ref = parseRepo(repoParam);
    if (!ref) {
      return { error: `Invalid repository '${repoParam}': expected owner/name` };
    }

    try {
      switch (action) {
        case 'analyze':
          return await this.analyze(octokit, ref);
        case 'list_issues':
          return await this.listIssues(octokit, ref, params);
        case 'create_issue':
          return await this.createIssue(octokit, ref, params);
        case 'close_issues':
          return await this.closeIssues(octokit, ref, params);
        case 'get_stats':
          return await this.getStats(octokit, ref);
        case 'list_prs':
          return await this.listPullRequests(octokit, ref, params);
        default:
          return { error: `Unknown action: ${action}` };
      }
    } catch (error) {
      const mapped = mapOctokitError(error, `${action} ${ref.owner}/${ref.repo}`);
      this.context.logger.error(`Action ${action} failed: ${mapped.message}`);
      return { error: mapped.message, code: mapped.code };
    }
  }

  private async resolveClient(params: SkillParams): Promise<Octokit | null> {
    const token = readString(params, 'token')?.trim()
      || await this.context.credentials.getCredential(GITHUB_TOKEN_CREDENTIAL);
    if (!token) {
      this.context.logger.error('No GitHub token found');
      return null;
    }
    if (this.client && this.client.token === token) {
      return this.client.octokit;
    }
    const octokit = this.createClient(token);
    this.client = { token, octokit };
    return octokit;
  }


  private async analyze(octokit: Octokit, ref: RepoRef): Promise<JsonObject> {
    const { data: repo } = await octokit.rest.repos.get(ref);
    const { data: languages } = await octokit.rest.repos.listLanguages(ref);
    const { data: commits } = await octokit.rest.repos.listCommits({ ...ref, per_page: RECENT_COMMITS });

    return {
      analysis: {
        name: repo.full_name,
        description: repo.description,
        language: repo.language ?? null,
        stars: repo.stargazers_count,
        forks: repo.forks_count,
        openIssues: repo.open_issues_count,
        createdAt: repo.created_at,
        updatedAt: repo.updated_at,
        topics: repo.topics ?? [],
        defaultBranch: repo.default_branch,
        languages: { ...languages },
        recentCommits: commits.map((commit) => ({
          sha: commit.sha.slice(0, 7),
          message: commit.commit.message.split('\n')[0] ?? '',
          author: commit.commit.author?.name ?? null,
          date: commit.commit.author?.date ?? null,
        })),
      },
    };
  }

  private async listIssues(octokit: Octokit, ref: RepoRef, params: SkillParams): Promise<JsonObject> {
    const state = readState(params);
    if (!isIssueState(state)) return invalidState(state);
    const { data } = await octokit.rest.issues.listForRepo({ ...ref, state, per_page: LIST_LIMIT });

    // the issues endpoint also returns pull requests
    const issues = data
      .filter((issue) => !issue.pull_request)
      .map((issue) => ({
        number: issue.number,
        title: issue.title,
        state: issue.state,
        author: issue.user?.login ?? null,
        createdAt: issue.created_at,
        labels: issue.labels.map(labelName),
        comments: issue.comments,
      }));

    return { issues, count: issues.length };
  }

  private async createIssue(octokit: Octokit, ref: RepoRef, params: SkillParams): Promise<JsonObject> {
    const title = readString(params, 'title')?.trim();
    if (!title) {
      return { error: 'No issue title provided' };
    }

    const { data: issue } = await octokit.rest.issues.create({
      ...ref,
      title,
      body: readString(params, 'body') ?? '',
      labels: readStringArray(params, 'labels') ?? [],
    });

    return {
      created: true,
      issue: { number: issue.number, title: issue.title, url: issue.html_url },
    };
  }

  /**
   * Closes open issues carrying any of `labels`. Without labels nothing is
   * closed. A failure on one issue is logged and does not stop the rest.
   */
  private async closeIssues(octokit: Octokit, ref: RepoRef, params: SkillParams): Promise<JsonObject> {
    const labels = readStringArray(params, 'labels') ?? [];
    if (labels.length === 0) {
      return { closedCount: 0, closedIssues: [] };
    }

    const open = await octokit.paginate(octokit.rest.issues.listForRepo, {
      ...ref,
      state: 'open',
      per_page: 100,
    });

    const closedIssues: JsonObject[] = [];
    for (const issue of open) {
      if (issue.pull_request) continue;
      const names = issue.labels.map(labelName);
      if (!labels.some((label) => names.includes(label))) continue;

      try {
        await octokit.rest.issues.update({ ...ref, issue_number: issue.number, state: 'closed' });
        closedIssues.push({ number: issue.number, title: issue.title });
      } catch (error) {
        this.context.logger.error(`Failed to close issue #${issue.number}: ${errorMessage(error)}`);
      }
    }

    return { closedCount: closedIssues.length, closedIssues };
  }

  private async getStats(octokit: Octokit, ref: RepoRef): Promise<JsonObject> {
    const { data: repo } = await octokit.rest.repos.get(ref);
    const page = { ...ref, per_page: 1 };

    const contributors = await octokit.rest.repos.listContributors({ ...page, anon: 'true' });
    const commits = await octokit.rest.repos.listCommits(page);
    const branches = await octokit.rest.repos.listBranches(page);
    const tags = await octokit.rest.repos.listTags(page);
    const releases = await octokit.rest.repos.listReleases(page);
    const openPulls = await octokit.rest.pulls.list({ ...page, state: 'open' });
    const closedPulls = await octokit.rest.pulls.list({ ...page, state: 'closed' });

    const open = countFromLinkHeader(openPulls.headers.link, openPulls.data.length);
    const closed = countFromLinkHeader(closedPulls.headers.link, closedPulls.data.length);

    return {
      stats: {
        contributors: countFromLinkHeader(contributors.headers.link, contributors.data.length),
        commits: countFromLinkHeader(commits.headers.link, commits.data.length),
        branches: countFromLinkHeader(branches.headers.link, branches.data.length),
        tags: countFromLinkHeader(tags.headers.link, tags.data.length),
        releases: countFromLinkHeader(releases.headers.link, releases.data.length),
        watchers: repo.subscribers_count ?? repo.watchers_count,
        networkCount: repo.network_count ?? null,
        sizeKb: repo.size,
        pullRequests: { open, closed, total: open + closed },
      },
    };
  }

  private async listPullRequests(octokit: Octokit, ref: RepoRef, params: SkillParams): Promise<JsonObject> {
    const state = readState(params);
    if (!isIssueState(state)) return invalidState(state);
    const { data } = await octokit.rest.pulls.list({ ...ref, state, per_page: LIST_LIMIT });

    const pullRequests = data.map((pr) => ({
      number: pr.number,
      title: pr.title,
      state: pr.state,
      author: pr.user?.login ?? null,
      createdAt: pr.created_at,
      draft: pr.draft ?? false,
    }));

    return { pullRequests, count: pullRequests.length };
  }
}

export function createGitHubAgentSkill(options: GitHubAgentSkillOptions = {}): SkillDefinition {
  const createClient = options.createClient ?? ((token: string) => new Octokit({ auth: token }));

  return {
    name: 'github_agent',
    description: 'GitHub repository management and automation capabilities',
    parameters: {
      action: { type: 'string', description: 'analyze | list_issues | create_issue | close_issues | get_stats | list_prs' },
      repo: { type: 'string', required: false, description: 'owner/name' },
      token: { type: 'string', required: false, description: 'Overrides the github_token credential' },
      state: { type: 'string', default: 'open', enum: [...ISSUE_STATES] },
      labels: { type: 'array', required: false, description: 'Labels for create_issue and close_issues' },
      title: { type: 'string', required: false },
      body: { type: 'string', default: '' },
    },
    create: (context) => new GitHubAgentSkill(context, createClient),
  };
}

export const githubAgentSkill = createGitHubAgentSkill();
