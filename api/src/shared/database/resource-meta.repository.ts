import { Injectable } from '@nestjs/common';
import { EntityKind, ResourceMeta } from '../auth/authorization';
import { NotFoundError } from '../errors/app-errors';
import { DbExecutor } from './postgres.service';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

type MetaRow = { org_id: string; owner_id: string | null };

// Every query filters on the caller's tenant, so a row from another tenant is indistinguishable from no row.
const META_QUERIES: Record<Exclude<EntityKind, 'activity'>, string> = {
  organization: 'select id as org_id, null::uuid as owner_id from organizations where id = $1 and id = $2',
  project: 'select org_id, owner_id from projects where id = $1 and org_id = $2',
  tag: 'select org_id, null::uuid as owner_id from tags where id = $1 and org_id = $2',
  user: 'select org_id, null::uuid as owner_id from users where id = $1 and org_id = $2'
};

@Injectable()
export class ResourceMetaRepository {
  async load(
    db: DbExecutor,
    kind: EntityKind,
    id: string,
    tenantId: string,
    options: { forUpdate?: boolean } = {}
  ): Promise<ResourceMeta> {
    if (kind === 'activity' || !UUID_PATTERN.test(id)) {
      throw new NotFoundError();
    }

    const lock = options.forUpdate && kind !== 'organization' ? ' for update' : '';
    const res = await db.query<MetaRow>(`${META_QUERIES[kind]} limit 1${lock}`, [id, tenantId]);

    const row = res.rows[0];
    if (!row) {
      throw new NotFoundError();
    }

    return { tenantId: row.org_id, ownerUserId: row.owner_id };
  }
}
