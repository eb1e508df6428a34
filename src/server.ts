import express from 'express';
import type { Server } from 'http';
import path from 'path';
import type { Logger } from './types.js';

/** Serve a finished run's output directory so the HTML report can be browsed. */
export function createReportApp(outputDir: string): express.Express {
  const root = path.resolve(outputDir);
  const app = express();

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use(express.static(root, { index: 'index.html', dotfiles: 'ignore' }));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}

export function startReportServer(outputDir: string, port: number, logger: Logger = console): Promise<Server> {
  const app = createReportApp(outputDir);
  return new Promise((resolve, reject) => {
    const server = app.listen(port);
    server.once('listening', () => {
      const address = server.address();
      const actual = typeof address === 'object' && address ? address.port : port;
      logger.log(`Server: report available at http://localhost:${actual}/ (Ctrl-C to stop)`);
      resolve(server);
    });
    server.once('error', reject);
  });
}
