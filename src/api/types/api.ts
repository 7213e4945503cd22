import { z } from 'zod';

export const ValidateDocumentBodySchema = z.object({
  fileName: z.string().min(1),
  contentType: z
    .string()
    .regex(/^[\w.+-]+\/[\w.+-]+$/, 'must be a MIME type such as application/pdf'),
  contentBase64: z.string().min(1),
});

export type ValidateDocumentBody = z.infer<typeof ValidateDocumentBodySchema>;

export interface DataResponse<T> {
  data: T;
}
