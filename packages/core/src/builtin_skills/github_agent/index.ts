export {
  GITHUB_TOKEN_CREDENTIAL,
  countFromLinkHeader,
  createGitHubAgentSkill,
  githubAgentSkill,
  parseRepo,
} from './github_agent_skill';
export type { GitHubAgentSkillOptions, OctokitFactory, RepoRef } from './github_agent_skill';
