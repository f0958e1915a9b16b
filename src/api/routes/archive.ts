import fs from 'node:fs';
import path from 'node:path';
import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { resolvePath } from '../../shared/utils.js';

const PREFIX = '/local-archive/';

/** Resolve a request path under the archive root; null when it escapes it or is not markdown. */
export function archiveFilePath(root: string, encodedRelative: string): string | null {
  let relative: string;
  try {
    relative = decodeURIComponent(encodedRelative);
  } catch {
    return null;
  }
  const target = path.resolve(root, relative);
  if (!target.startsWith(root + path.sep) || path.extname(target) !== '.md') return null;
  return target;
}

/** Serves documents written by the local archive backend at `/local-archive/<path>`. */
export function archiveRoutes(ctx: AppContext): Hono {
  const app = new Hono();
  const root = path.resolve(resolvePath(ctx.config.archive.dir));

  app.get('/local-archive/*', async (c) => {
    const pathname = new URL(c.req.url).pathname;
    const target = archiveFilePath(root, pathname.slice(PREFIX.length));
    if (!target || !fs.existsSync(target) || !fs.statSync(target).isFile()) {
      return c.json({ error: 'Not found' }, 404);
    }

    const body = await fs.promises.readFile(target, 'utf-8');
    c.header('Content-Type', 'text/markdown; charset=utf-8');
    return c.body(body);
  });

  return app;
}
