import type { FastifyInstance } from 'fastify';
import { LlmProvider } from '../../../llm/provider';
import { PromptTemplateStore } from '../../../prompts/templateStore';
import { WithdrawalProofValidationService } from '../../../services/validationService';
import { silentLogger } from '../../../utils/logger';
import { PROMPTS_DIR, ScriptedBackend, ScriptedReply } from '../../../../tests/helpers/scriptedBackend';
import { ServerOptions, buildServer } from '../../server';

export const TEST_API_KEY = 'test-api-key';

export interface TestServer {
  server: FastifyInstance;
  backend: ScriptedBackend;
  cleanup: () => Promise<void>;
}

export async function createTestServer(
  replies: ScriptedReply[] = [],
  config: Partial<ServerOptions['config']> = {}
): Promise<TestServer> {
  const backend = new ScriptedBackend(replies);
  const templates = new PromptTemplateStore({ rootDir: PROMPTS_DIR, logger: silentLogger });
  await templates.load();
  const service = new WithdrawalProofValidationService({
    provider: new LlmProvider(backend, silentLogger),
    templates,
    logger: silentLogger,
  });

  const server = await buildServer({
    service,
    config: { apiKey: TEST_API_KEY, corsOrigin: '*', maxDocumentBytes: 1024 * 1024, ...config },
  });
  await server.ready();

  return {
    server,
    backend,
    cleanup: async () => {
      await server.close();
    },
  };
}

export function documentBody(content: Buffer, contentType = 'application/pdf') {
  return {
    fileName: 'factuur.pdf',
    contentType,
    contentBase64: content.toString('base64'),
  };
}
