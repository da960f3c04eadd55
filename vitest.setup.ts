/**
 * Global Vitest Setup
 *
 * Runs before each test so configuration and logging never pick up the
 * developer's own GitHub environment.
 */

import { beforeEach } from 'vitest';

beforeEach(() => {
  delete process.env.GHSCOPE_DEBUG;
  delete process.env.GHSCOPE_HTTP_TIMEOUT_MS;
  delete process.env.GITHUB_TOKEN;
  delete process.env.GITHUB_API_URL;
  delete process.env.GITHUB_SSL_VERIFY;
  delete process.env.SSL_CERT_FILE;
});
