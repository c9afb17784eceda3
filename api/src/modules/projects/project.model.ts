import { Tag } from '../tags/tag.model';

export type Project = {
  id: string;
  tenantId: string;
  ownerId: string;
  title: string;
  description: string;
  githubUrl: string | null;
  isPublic: boolean;
  tags: Tag[];
  createdAt: string;
  updatedAt: string;
};

export const PROJECT_SORTS = ['newest', 'oldest', 'title_asc', 'title_desc'] as const;

export type ProjectSort = (typeof PROJECT_SORTS)[number];
