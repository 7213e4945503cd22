import 'dotenv/config';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import { AppConfig, loadAppConfig } from '../config/appConfig';
import { loadProviderConfig } from '../llm/config';
import { createLlmProvider } from '../llm/provider';
import {
  WithdrawalProofValidationService,
  createValidationService,
} from '../services/validationService';
import { ValidationController } from './controllers/validationController';
import { errorHandler, requireApiKey } from './middleware';
import { registerPromptRoutes, registerValidationRoutes } from './routes';

export interface ServerOptions {
  service: WithdrawalProofValidationService;
  config: Pick<AppConfig, 'apiKey' | 'corsOrigin' | 'maxDocumentBytes'>;
}

async function buildServer({ service, config }: ServerOptions) {
  const fastify = Fastify({
    // base64 inflates the document by a third
    bodyLimit: Math.ceil((config.maxDocumentBytes * 4) / 3) + 64 * 1024,
    logger: {
      level: process.env.LOG_LEVEL || 'info',
      transport:
        process.env.NODE_ENV === 'development'
          ? {
              target: 'pino-pretty',
              options: {
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
              },
            }
          : undefined,
    },
  });

  await fastify.register(cors, {
    origin: config.corsOrigin,
    credentials: true,
  });

  fastify.setErrorHandler(errorHandler);

  fastify.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString(), steps: service.stepNames };
  });

  const controller = new ValidationController(service, config.maxDocumentBytes);
  const auth = requireApiKey(config.apiKey);
  registerValidationRoutes(fastify, controller, auth);
  registerPromptRoutes(fastify, controller, auth);

  return fastify;
}

async function start() {
  try {
    const config = loadAppConfig();
    const provider = createLlmProvider(loadProviderConfig());
    const service = await createValidationService(config, provider);
    const server = await buildServer({ service, config });

    await server.listen({ port: config.port, host: config.host });
    server.log.info(`API server listening on http://${config.host}:${config.port}`);
  } catch (err) {
    console.error('Error starting server:', err);
    process.exit(1);
  }
}

if (require.main === module) {
  void start();
}

export { buildServer };
