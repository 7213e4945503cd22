import type { FastifyReply, FastifyRequest } from 'fastify';
import { toValidationReport } from '../../services/report';
import type { WithdrawalProofValidationService } from '../../services/validationService';
import { createError } from '../middleware/errorHandler';
import { ValidateDocumentBodySchema } from '../types/api';

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export class ValidationController {
  constructor(
    private readonly service: WithdrawalProofValidationService,
    private readonly maxDocumentBytes: number
  ) {}

  async validate(request: FastifyRequest, reply: FastifyReply) {
    const body = ValidateDocumentBodySchema.parse(request.body);
    const encoded = body.contentBase64.replace(/\s+/g, '');
    if (!BASE64.test(encoded)) {
      throw createError('contentBase64 is not valid base64', 400, 'INVALID_CONTENT');
    }

    const content = Buffer.from(encoded, 'base64');
    if (content.length === 0) {
      throw createError('Document is empty', 400, 'EMPTY_DOCUMENT');
    }
    if (content.length > this.maxDocumentBytes) {
      throw createError(
        `Document exceeds the maximum size of ${this.maxDocumentBytes} bytes`,
        413,
        'DOCUMENT_TOO_LARGE'
      );
    }

    const state = await this.service.validate({
      fileName: body.fileName,
      contentType: body.contentType,
      content,
    });

    reply.send({ data: toValidationReport(state) });
  }

  async reloadPrompts(_request: FastifyRequest, reply: FastifyReply) {
    const summary = await this.service.reloadTemplates();
    reply.send({ data: summary });
  }
}
