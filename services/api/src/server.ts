import cors from 'cors';
import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import { randomUUID } from 'node:crypto';
import { AppError, CodeRejectedError, formatMemoryLimit } from '@shortexec/core';
import { ZodError } from 'zod';
import { loadApiConfig, type ApiConfig } from './config';
import { attachActor } from './lib/auth-middleware';
import { formatErrorForLog, logError, logInfo } from './lib/log';
import { setLogBufferCapacity } from './lib/log-buffer';
import { createRateLimitMiddleware } from './lib/rate-limit';
import { RuntimeLimits } from './lib/resource-limits';
import { registerInvokeRoutes } from './routes/invoke';
import { registerObservabilityRoutes } from './routes/observability';
import { registerSettingsRoutes } from './routes/settings';
import { registerSnippetRoutes } from './routes/snippets';
import { AuditLogger } from './services/audit';
import { HmacTokenAuthService, type AuthService } from './services/auth';
import { createEvaluator, type Evaluator } from './services/evaluator';
import { SnippetExecutor } from './services/executor';
import { createSnippetRegistry, type SnippetRegistry } from './services/registry';
import { ContentRenderer } from './services/renderer';
import { createSecurityConfigProvider, type SecurityConfigProvider } from './services/security-config';

export type ApiDependencies = {
  config: ApiConfig;
  registry: SnippetRegistry;
  auth: AuthService;
  evaluator: Evaluator;
  securityConfig: SecurityConfigProvider;
  limits: RuntimeLimits;
  audit: AuditLogger;
  executor: SnippetExecutor;
  renderer: ContentRenderer;
  now: () => Date;
};

export type ApiRuntime = {
  app: Express;
  deps: ApiDependencies;
  close: () => Promise<void>;
};

const INTERNAL_ERROR_MESSAGE = 'An unexpected error occurred.';
const REQUEST_ID_MAX_LENGTH = 128;
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;

export function errorHandler(
  error: unknown,
  _req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (error instanceof CodeRejectedError) {
    res.status(error.status).json({
      error: {
        code: error.code,
        message: error.message,
        rejection: error.rejection,
      },
    });
    return;
  }

  if (error instanceof AppError) {
    res.status(error.status).json({
      error: {
        code: error.code,
        message: error.message,
      },
    });
    return;
  }

  if (error instanceof ZodError) {
    res.status(400).json({
      error: {
        code: 'VALIDATION_ERROR',
        message: error.issues.map((issue) => issue.message).join('; '),
      },
    });
    return;
  }

  logError('api.error', { error: formatErrorForLog(error) });
  res.status(500).json({
    error: {
      code: 'INTERNAL',
      message: INTERNAL_ERROR_MESSAGE,
    },
  });
}

/**
 * Wire the execution pipeline from configuration. Anything passed in replaces the default.
 */
export function createApiDependencies(incomingDeps: Partial<ApiDependencies> = {}): ApiDependencies {
  const config = incomingDeps.config ?? loadApiConfig();
  const securityConfig = incomingDeps.securityConfig ?? createSecurityConfigProvider(config);
  const registry = incomingDeps.registry ?? createSnippetRegistry(config);
  const evaluator = incomingDeps.evaluator ?? createEvaluator(config.evaluator);
  const limits =
    incomingDeps.limits ??
    new RuntimeLimits({
      memoryLimitBytes: config.runtimeMemoryLimitBytes,
      timeLimitSeconds: config.runtimeTimeLimitSeconds,
    });
  const now = incomingDeps.now ?? (() => new Date());
  const audit =
    incomingDeps.audit ??
    new AuditLogger({ isEnabled: () => securityConfig.get().enableExecutionLog, now });
  const executor =
    incomingDeps.executor ?? new SnippetExecutor({ registry, securityConfig, evaluator, limits, audit });

  return {
    config,
    registry,
    auth:
      incomingDeps.auth ??
      new HmacTokenAuthService({
        authTokenSecret: config.authTokenSecret,
        authTokenTtlSeconds: config.authTokenTtlSeconds,
        now,
      }),
    evaluator,
    securityConfig,
    limits,
    audit,
    executor,
    renderer: incomingDeps.renderer ?? new ContentRenderer({ executor, registry }),
    now,
  };
}

export function createApiRuntime(incomingDeps?: Partial<ApiDependencies>): ApiRuntime {
  const deps = createApiDependencies(incomingDeps);
  setLogBufferCapacity(deps.config.logBufferCapacity);

  const app = express();
  app.disable('x-powered-by');

  app.use((req, res, next) => {
    const incomingRequestId = req.header('x-request-id')?.trim();
    const requestId =
      incomingRequestId &&
      incomingRequestId.length <= REQUEST_ID_MAX_LENGTH &&
      REQUEST_ID_PATTERN.test(incomingRequestId)
        ? incomingRequestId
        : randomUUID();
    res.setHeader('X-Request-ID', requestId);
    next();
  });

  app.use(
    cors({
      origin: deps.config.webOrigin,
      credentials: true,
      exposedHeaders: ['X-Request-ID'],
    })
  );
  app.use(express.json({ limit: '2mb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', evaluator: deps.config.evaluator, registry: deps.config.registryDriver });
  });

  app.use('/api', attachActor(deps.auth));

  const writeRateLimit = createRateLimitMiddleware({
    limit: deps.config.apiWriteRateLimitMax,
    windowMs: deps.config.apiWriteRateLimitWindowMs,
    keyPrefix: 'api-write',
  });
  app.use('/api', (req, res, next) => {
    if (req.method === 'GET') {
      next();
      return;
    }
    writeRateLimit(req, res, next);
  });

  registerSnippetRoutes(app, {
    registry: deps.registry,
    securityConfig: deps.securityConfig,
    executor: deps.executor,
  });
  registerInvokeRoutes(app, { executor: deps.executor, renderer: deps.renderer });
  registerSettingsRoutes(app, { registry: deps.registry });
  registerObservabilityRoutes(app, { now: deps.now });

  app.use(errorHandler);

  const close = async (): Promise<void> => {
    writeRateLimit.close();
    const results = await Promise.allSettled([deps.evaluator.close(), deps.registry.close()]);
    for (const result of results) {
      if (result.status === 'rejected') {
        logError('api.shutdown.dependency_close_failed', { error: formatErrorForLog(result.reason) });
      }
    }
  };

  return { app, deps, close };
}

if (require.main === module) {
  const config = loadApiConfig();
  const runtime = createApiRuntime({ config });
  const server = runtime.app.listen(config.port, () => {
    logInfo('api.started', {
      port: config.port,
      evaluator: config.evaluator,
      registry: config.registryDriver,
      runtimeMemoryLimit: formatMemoryLimit(config.runtimeMemoryLimitBytes),
    });
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logInfo('api.stopping', { signal });

    let exitCode = 0;
    try {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      });
    } catch (error) {
      exitCode = 1;
      logError('api.shutdown.server_close_failed', { error: formatErrorForLog(error) });
    }

    await runtime.close();
    process.exit(exitCode);
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}
