import { z } from 'zod';
import { TAG_NAME_MAX_LENGTH, normalizeTagName } from './tag-names';

export const createTagSchema = z.object({
  name: z.string().transform(normalizeTagName).pipe(z.string().min(1).max(TAG_NAME_MAX_LENGTH))
});

export type CreateTagInput = z.infer<typeof createTagSchema>;
