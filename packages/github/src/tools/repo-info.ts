import { TOOL_LIMITS } from '@ghscope/config';
import { resolveRepo } from '@ghscope/git';
import { capList, truncateText } from '@ghscope/utils';

import { decodePayload, RepoSchema } from '../schemas.js';
import { defineTool, repoLocatorShape } from '../tool-registry.js';

import { repoPath } from './shared.js';

export interface RepoInfoResult {
  full_name: string | null;
  description: string | null;
  description_truncated: boolean;
  default_branch: string | null;
  language: string | null;
  license: string | null;
  topics: string[];
  topics_dropped: number;
  stars: number | null;
  forks: number | null;
  open_issues: number | null;
  private: boolean | null;
  archived: boolean | null;
  html_url: string | null;
  clone_url: string | null;
  updated_at: string | null;
}

export const repoInfoTool = defineTool({
  name: 'github_repo_info',
  description: 'Get basic repository metadata (description, default branch, language, license, topics, counts).',
  inputShape: { ...repoLocatorShape },
  async run(args, { gateway }): Promise<RepoInfoResult> {
    const repo = resolveRepo(args.repo, args.root_path);
    const data = decodePayload(RepoSchema, await gateway.requestJson('GET', repoPath(repo)), 'repository');

    const description =
      data.description == null ? null : truncateText(data.description, TOOL_LIMITS.DESCRIPTION_CHARS.max, '');
    const topics = capList(data.topics ?? [], TOOL_LIMITS.TOPICS.max);

    return {
      full_name: data.full_name ?? null,
      description: description?.text ?? null,
      description_truncated: description?.truncated ?? false,
      default_branch: data.default_branch ?? null,
      language: data.language ?? null,
      license: data.license?.name ?? null,
      topics: topics.items,
      topics_dropped: topics.dropped,
      stars: data.stargazers_count ?? null,
      forks: data.forks_count ?? null,
      open_issues: data.open_issues_count ?? null,
      private: data.private ?? null,
      archived: data.archived ?? null,
      html_url: data.html_url ?? null,
      clone_url: data.clone_url ?? null,
      updated_at: data.updated_at ?? null,
    };
  },
});
