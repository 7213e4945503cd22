#!/usr/bin/env node
import 'dotenv/config';
import { readFile } from 'fs/promises';
import path from 'path';
import { loadAppConfig } from './config/appConfig';
import { loadProviderConfig } from './llm/config';
import { createLlmProvider } from './llm/provider';
import { toValidationReport } from './services/report';
import { createValidationService } from './services/validationService';

const CONTENT_TYPES: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp',
  '.heic': 'image/heic',
};

export function contentTypeFor(filePath: string): string | undefined {
  return CONTENT_TYPES[path.extname(filePath).toLowerCase()];
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    console.error('Usage: validate-withdrawal-proof <path-to-document>');
    console.error(`Supported formats: ${Object.keys(CONTENT_TYPES).join(', ')}`);
    process.exit(1);
  }

  const documentPath = args[0];
  const contentType = contentTypeFor(documentPath);
  if (!contentType) {
    console.error(`Unsupported file type: ${documentPath}`);
    process.exit(1);
  }

  let content: Buffer;
  try {
    content = await readFile(documentPath);
  } catch (error) {
    console.error(`Failed to read document: ${documentPath}`);
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  try {
    const config = loadAppConfig();
    const provider = createLlmProvider(loadProviderConfig());
    const service = await createValidationService(config, provider);
    const state = await service.validate(
      { fileName: path.basename(documentPath), contentType, content },
      { signal: controller.signal }
    );

    console.log(JSON.stringify(toValidationReport(state), null, 2));
    if (state.outcome === 'Error' || state.outcome === 'Cancelled') {
      process.exit(1);
    }
  } catch (error) {
    console.error('Fatal error:', error);
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}
