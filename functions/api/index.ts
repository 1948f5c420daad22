// ============================================================================
// BENCHMARK REPORT API - SERVER ENTRY POINT
// ============================================================================

import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import path from 'node:path';

import { MetricCatalog } from '../_shared/benchmark_catalog/catalog.ts';
import { createCloudWatchBackend } from '../_shared/benchmark_catalog/cloudwatch_backend.ts';
import { createFileConfigLoader } from '../_shared/benchmark_catalog/config_loader.ts';
import { loadCatalogSettings } from '../_shared/benchmark_catalog/settings.ts';
import { logger, setLogLevel } from '../_shared/logger.ts';
import { createRequestHandler } from './router.ts';
import { internalErrorResponse } from './utils/responses.ts';

const settings = loadCatalogSettings();
setLogLevel(settings.logLevel);

const catalog = new MetricCatalog({
  backend: createCloudWatchBackend(settings),
  loadConfig: createFileConfigLoader(path.resolve(process.cwd(), settings.configPath)),
  logger,
  namespace: settings.namespace,
  alarmConsoleRegion: settings.alarmConsoleRegion,
  lookbackDays: settings.lookbackDays,
});

const handleRequest = createRequestHandler({ catalog, logger });

function toRequest(req: IncomingMessage): Request {
  const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) {
      value.forEach((item) => headers.append(key, item));
    } else if (value !== undefined) {
      headers.set(key, value);
    }
  }
  return new Request(url, { method: req.method ?? 'GET', headers });
}

async function writeResponse(res: ServerResponse, response: Response): Promise<void> {
  res.statusCode = response.status;
  response.headers.forEach((value, key) => {
    res.setHeader(key, value);
  });
  res.end(Buffer.from(await response.arrayBuffer()));
}

const server = createServer((req, res) => {
  handleRequest(toRequest(req))
    .then((response) => writeResponse(res, response))
    .catch(async (error: unknown) => {
      logger.error('Server error', {
        error: error instanceof Error ? error.message : String(error),
      });
      await writeResponse(res, internalErrorResponse('server-error'));
    })
    .catch((error: unknown) => {
      logger.error('Failed to write error response', {
        error: error instanceof Error ? error.message : String(error),
      });
      res.destroy();
    });
});

server.listen(settings.port, () => {
  logger.info('Benchmark report API running', { port: settings.port });
});
