import { Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { Principal } from '../../shared/auth/auth.types';
import { creationStamp } from '../../shared/auth/authorization';
import { DbExecutor } from '../../shared/database/postgres.service';
import { NotFoundError } from '../../shared/errors/app-errors';
import { Tag } from '../tags/tag.model';
import { normalizeTagName } from '../tags/tag-names';
import { TagsService } from '../tags/tags.service';
import { Project, ProjectSort } from './project.model';
import { CreateProjectInput, ListProjectsQuery, UpdateProjectInput } from './projects.schemas';

type DbProject = {
  id: string;
  org_id: string;
  owner_id: string;
  title: string;
  description: string;
  github_url: string | null;
  is_public: boolean;
  created_at: string;
  updated_at: string;
  tags: unknown;
};

const tagRowsSchema = z.array(z.object({ id: z.string(), name: z.string() }));

const PROJECT_COLUMNS = `p.id, p.org_id, p.owner_id, p.title, p.description, p.github_url, p.is_public,
       p.created_at, p.updated_at,
       coalesce(
         (select json_agg(json_build_object('id', t.id, 'name', t.name) order by t.name)
          from project_tags pt
          inner join tags t on t.id = pt.tag_id
          where pt.project_id = p.id),
         '[]'::json
       ) as tags`;

const ORDER_BY: Record<ProjectSort, string> = {
  newest: 'p.created_at desc, p.id desc',
  oldest: 'p.created_at asc, p.id asc',
  title_asc: 'p.title asc, p.id asc',
  title_desc: 'p.title desc, p.id desc'
};

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

@Injectable()
export class ProjectsService {
  constructor(private readonly tags: TagsService) {}

  /** Owner and tenant always come from the principal, never from the payload. */
  async create(tx: DbExecutor, principal: Principal, input: CreateProjectInput): Promise<Project> {
    const stamp = creationStamp(principal);
    const id = randomUUID();

    await tx.query(
      `insert into projects (id, org_id, owner_id, title, description, github_url, is_public)
       values ($1, $2, $3, $4, $5, $6, $7)`,
      [id, stamp.tenantId, stamp.ownerUserId, input.title, input.description, input.githubUrl, input.isPublic]
    );

    const tags = await this.tags.upsertMany(tx, stamp.tenantId, input.tagNames);
    await this.linkTags(tx, id, tags);

    return this.getOrThrow(tx, stamp.tenantId, id);
  }

  async list(db: DbExecutor, tenantId: string, query: ListProjectsQuery): Promise<Project[]> {
    const values: unknown[] = [tenantId];
    const conditions = ['p.org_id = $1'];

    if (query.publicOnly) {
      conditions.push('p.is_public = true');
    }

    if (query.q) {
      values.push(`%${escapeLike(query.q)}%`);
      conditions.push(`(p.title ilike $${values.length} or p.description ilike $${values.length})`);
    }

    if (query.tag) {
      values.push(normalizeTagName(query.tag));
      conditions.push(
        `exists (select 1 from project_tags pt
                 inner join tags t on t.id = pt.tag_id
                 where pt.project_id = p.id and t.org_id = $1 and t.name = $${values.length})`
      );
    }

    values.push(query.limit, query.offset);
    const res = await db.query<DbProject>(
      `select ${PROJECT_COLUMNS}
       from projects p
       where ${conditions.join(' and ')}
       order by ${ORDER_BY[query.sort]}
       limit $${values.length - 1} offset $${values.length}`,
      values
    );

    return res.rows.map((row) => this.toProject(row));
  }

  async getOrThrow(db: DbExecutor, tenantId: string, projectId: string): Promise<Project> {
    const res = await db.query<DbProject>(
      `select ${PROJECT_COLUMNS}
       from projects p
       where p.id = $1 and p.org_id = $2
       limit 1`,
      [projectId, tenantId]
    );

    const row = res.rows[0];
    if (!row) {
      throw new NotFoundError();
    }
    return this.toProject(row);
  }

  async update(tx: DbExecutor, tenantId: string, projectId: string, input: UpdateProjectInput): Promise<Project> {
    const assignments: string[] = [];
    const values: unknown[] = [projectId, tenantId];

    const set = (column: string, value: unknown): void => {
      values.push(value);
      assignments.push(`${column} = $${values.length}`);
    };

    if (input.title !== undefined) {
      set('title', input.title);
    }
    if (input.description !== undefined) {
      set('description', input.description);
    }
    if (input.githubUrl !== undefined) {
      set('github_url', input.githubUrl);
    }
    if (input.isPublic !== undefined) {
      set('is_public', input.isPublic);
    }

    const res = await tx.query(
      `update projects
       set ${[...assignments, 'updated_at = now()'].join(', ')}
       where id = $1 and org_id = $2`,
      values
    );
    if (res.rowCount === 0) {
      throw new NotFoundError();
    }

    if (input.tagNames !== undefined) {
      await tx.query('delete from project_tags where project_id = $1', [projectId]);
      const tags = await this.tags.upsertMany(tx, tenantId, input.tagNames);
      await this.linkTags(tx, projectId, tags);
    }

    return this.getOrThrow(tx, tenantId, projectId);
  }

  async delete(tx: DbExecutor, tenantId: string, projectId: string): Promise<{ ok: true }> {
    await tx.query('delete from project_tags where project_id = $1', [projectId]);
    const res = await tx.query('delete from projects where id = $1 and org_id = $2', [projectId, tenantId]);
    if (res.rowCount === 0) {
      throw new NotFoundError();
    }
    return { ok: true };
  }

  private async linkTags(tx: DbExecutor, projectId: string, tags: Tag[]): Promise<void> {
    for (const tag of tags) {
      await tx.query(
        `insert into project_tags (project_id, tag_id)
         values ($1, $2)
         on conflict do nothing`,
        [projectId, tag.id]
      );
    }
  }

  private toProject(row: DbProject): Project {
    return {
      id: row.id,
      tenantId: row.org_id,
      ownerId: row.owner_id,
      title: row.title,
      description: row.description,
      githubUrl: row.github_url,
      isPublic: row.is_public,
      tags: tagRowsSchema.parse(row.tags),
      createdAt: row.created_at,
      updatedAt: row.updated_at
    };
  }
}
