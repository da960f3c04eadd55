import { TOOL_LIMITS } from '@ghscope/config';
import { resolveRepo } from '@ghscope/git';
import { capList, truncateText } from '@ghscope/utils';
import { z } from 'zod';

import { ToolArgumentError } from '../errors.js';
import { ContentsSchema, decodePayload } from '../schemas.js';
import { defineTool, repoLocatorShape } from '../tool-registry.js';

import { optionalText, repoPath, resolveLimit } from './shared.js';

interface FileLocation {
  repo: string;
  path: string;
  ref: string | null;
}

export interface DirectoryEntry {
  type: string | null;
  name: string | null;
  path: string | null;
  sha: string | null;
  size: number | null;
}

export type GetFileResult =
  | (FileLocation & { type: 'dir'; items: DirectoryEntry[]; items_dropped: number })
  | (FileLocation & {
      type: 'file';
      sha: string | null;
      size: number | null;
      truncated: boolean;
      text: string;
      download_url: string | null;
      html_url: string | null;
    })
  | (FileLocation & {
      type: 'file';
      sha: string | null;
      size: number | null;
      note: string;
      download_url: string | null;
      html_url: string | null;
    })
  | (FileLocation & {
      type: string;
      sha: string | null;
      size: number | null;
      target: string | null;
      submodule_git_url: string | null;
      download_url: string | null;
      html_url: string | null;
    });

const NO_INLINE_CONTENT_NOTE = 'No inline content returned (file may be too large). Use download_url.';

/**
 * Repository-relative path with a leading slash removed
 */
export function cleanRepoPath(path: string): string {
  return path.trim().replace(/^\/+/, '');
}

/**
 * URL-encode each segment of a repository path
 */
export function encodeRepoPath(path: string): string {
  return path.split('/').map(segment => encodeURIComponent(segment)).join('/');
}

/**
 * Decode base64 content as UTF-8, falling back to Latin-1 for binary-ish files
 */
export function decodeBase64Text(content: string): string {
  const bytes = Buffer.from(content, 'base64');
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    return bytes.toString('latin1');
  }
}

export const getFileTool = defineTool({
  name: 'github_get_file',
  description:
    'Get a text file (or a directory listing) from a repository via the Contents API. Content is cut at max_chars.',
  inputShape: {
    path: z.string().describe('File path in the repository, e.g. "README.md" or ".github/workflows/ci.yml"'),
    ...repoLocatorShape,
    ref: z.string().optional().describe('Optional branch, tag or commit SHA'),
    max_chars: z
      .number()
      .optional()
      .describe(`Max characters of decoded content (${TOOL_LIMITS.FILE_CHARS.min}..${TOOL_LIMITS.FILE_CHARS.max}, default ${TOOL_LIMITS.FILE_CHARS.default})`),
  },
  async run(args, { gateway }): Promise<GetFileResult> {
    const repo = resolveRepo(args.repo, args.root_path);
    const path = cleanRepoPath(args.path);
    if (!path) {
      throw new ToolArgumentError('path is required');
    }
    const ref = optionalText(args.ref);
    const maxChars = resolveLimit(args.max_chars, TOOL_LIMITS.FILE_CHARS);

    const raw = await gateway.requestJson('GET', `${repoPath(repo)}/contents/${encodeRepoPath(path)}`, {
      params: { ref },
    });
    const data = decodePayload(ContentsSchema, raw, 'contents');
    const location: FileLocation = { repo: repo.fullName, path, ref: ref ?? null };

    if (Array.isArray(data)) {
      const listing = capList(data, TOOL_LIMITS.DIR_ENTRIES.max);
      return {
        ...location,
        type: 'dir',
        items: listing.items.map(entry => ({
          type: entry.type ?? null,
          name: entry.name ?? null,
          path: entry.path ?? null,
          sha: entry.sha ?? null,
          size: entry.size ?? null,
        })),
        items_dropped: listing.dropped,
      };
    }

    const common = {
      sha: data.sha ?? null,
      size: data.size ?? null,
      download_url: data.download_url ?? null,
      html_url: data.html_url ?? null,
    };

    if (data.type !== 'file') {
      return {
        ...location,
        type: data.type ?? 'unknown',
        ...common,
        target: data.target ?? null,
        submodule_git_url: data.submodule_git_url ?? null,
      };
    }

    if (data.encoding?.toLowerCase() !== 'base64' || !data.content) {
      return { ...location, type: 'file', ...common, note: NO_INLINE_CONTENT_NOTE };
    }

    const text = truncateText(decodeBase64Text(data.content), maxChars);
    return { ...location, type: 'file', ...common, truncated: text.truncated, text: text.text };
  },
});
