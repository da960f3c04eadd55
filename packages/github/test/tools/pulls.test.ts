import { TRUNCATION_MARKER } from '@ghscope/utils';
import { describe, it, expect } from 'vitest';

import { listPullsTool } from '../../src/tools/pulls.js';
import { createFakeGateway } from '../helpers/fake-gateway.js';

describe('github_list_pulls', () => {
  it('should shape pull requests', async () => {
    const { gateway, requestJson } = createFakeGateway({
      '/repos/acme/widgets/pulls': [
        {
          number: 7,
          title: 'Faster lexer',
          body: 'x'.repeat(30),
          state: 'closed',
          user: { login: 'octo' },
          draft: false,
          labels: [{ name: 'perf' }],
          assignees: [{ login: 'hubot' }],
          head: { ref: 'perf/lexer', sha: 'f00d' },
          base: { ref: 'main', sha: 'beef' },
          merged_at: '2026-02-01T00:00:00Z',
          html_url: 'https://github.com/acme/widgets/pull/7',
        },
      ],
    });

    const result = await listPullsTool.invoke(
      { repo: 'https://github.com/acme/widgets', state: 'closed', base: 'main', max_body_chars: 20 },
      { gateway }
    );

    expect(requestJson).toHaveBeenCalledWith('GET', '/repos/acme/widgets/pulls', {
      params: { state: 'closed', per_page: 20, sort: 'updated', direction: 'desc', base: 'main' },
    });
    expect(result).toEqual({
      repo: 'acme/widgets',
      count: 1,
      pulls: [
        {
          number: 7,
          title: 'Faster lexer',
          title_truncated: false,
          body: `${'x'.repeat(20)}${TRUNCATION_MARKER}`,
          body_truncated: true,
          state: 'closed',
          draft: false,
          merged: true,
          user: 'octo',
          labels: ['perf'],
          labels_dropped: 0,
          assignees: ['hubot'],
          assignees_dropped: 0,
          head_branch: 'perf/lexer',
          head_sha: 'f00d',
          base_branch: 'main',
          created_at: null,
          updated_at: null,
          html_url: 'https://github.com/acme/widgets/pull/7',
        },
      ],
    });
  });

  it('should cut long titles and report dropped labels and assignees', async () => {
    const { gateway } = createFakeGateway({
      '/repos/acme/widgets/pulls': [
        {
          number: 8,
          title: 'P'.repeat(700),
          labels: Array.from({ length: 21 }, (_, i) => ({ name: `l${i}` })),
          assignees: Array.from({ length: 23 }, (_, i) => ({ login: `a${i}` })),
        },
      ],
    });

    const result = await listPullsTool.invoke({ repo: 'acme/widgets' }, { gateway });

    expect(result).toMatchObject({
      pulls: [{ title: 'P'.repeat(500), title_truncated: true, labels_dropped: 1, assignees_dropped: 3 }],
    });
    expect(result).toHaveProperty('pulls.0.labels.length', 20);
    expect(result).toHaveProperty('pulls.0.assignees.length', 20);
  });

  it('should cap the page at the requested limit', async () => {
    const pulls = Array.from({ length: 5 }, (_, i) => ({ number: i + 1, merged_at: null }));
    const { gateway } = createFakeGateway({ '/repos/acme/widgets/pulls': pulls });

    const result = await listPullsTool.invoke({ repo: 'acme/widgets', limit: 3 }, { gateway });

    expect(result).toMatchObject({ count: 3, pulls: [{ number: 1, merged: false }, { number: 2 }, { number: 3 }] });
  });
});
