import { z } from 'zod';
import { TAG_NAME_MAX_LENGTH } from '../tags/tag-names';
import { PROJECT_SORTS } from './project.model';

const titleSchema = z.string().trim().min(2).max(200);
const githubUrlSchema = z.string().trim().url().max(500);
const tagNamesSchema = z.array(z.string().max(TAG_NAME_MAX_LENGTH)).max(20);

export const createProjectSchema = z.object({
  title: titleSchema,
  description: z.string().trim().min(1),
  githubUrl: githubUrlSchema.nullish().transform((value) => value ?? null),
  isPublic: z.boolean().default(false),
  tagNames: tagNamesSchema.default([])
});

export type CreateProjectInput = z.infer<typeof createProjectSchema>;

export const updateProjectSchema = z.object({
  title: titleSchema.optional(),
  description: z.string().trim().optional(),
  githubUrl: githubUrlSchema.nullable().optional(),
  isPublic: z.boolean().optional(),
  tagNames: tagNamesSchema.optional()
});

export type UpdateProjectInput = z.infer<typeof updateProjectSchema>;

export const listProjectsQuerySchema = z.object({
  q: z.string().trim().max(200).optional(),
  tag: z.string().trim().max(TAG_NAME_MAX_LENGTH).optional(),
  publicOnly: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
  limit: z.coerce.number().int().min(1).max(50).default(10),
  offset: z.coerce.number().int().min(0).default(0),
  sort: z.enum(PROJECT_SORTS).default('newest')
});

export type ListProjectsQuery = z.infer<typeof listProjectsQuerySchema>;
