import type pg from 'pg';
import type { User } from '../types/todo.js';
import type { UserLookup } from '../services/identity-resolver.js';

const USER_COLUMNS =
  'id, external_subject, email, nickname, profile_image_url, created_at, updated_at';

interface UserRow {
  id: string;
  external_subject: string;
  email: string;
  nickname: string;
  profile_image_url: string;
  created_at: Date;
  updated_at: Date;
}

function rowToUser(row: UserRow): User {
  return {
    id: row.id,
    externalSubject: row.external_subject,
    email: row.email,
    nickname: row.nickname,
    profileImageUrl: row.profile_image_url,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/** Users keyed by the identity provider's subject identifier. */
export class PostgresUserStore implements UserLookup {
  constructor(private readonly pool: pg.Pool) {}

  async getByExternalSubject(subject: string): Promise<User | undefined> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE external_subject = $1`,
      [subject],
    );
    const row = result.rows[0];
    return row ? rowToUser(row) : undefined;
  }
}
