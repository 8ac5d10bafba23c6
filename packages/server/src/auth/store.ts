// @module: server-auth-store
// @tags: auth, persistence, users

import type { Pool } from 'pg';
import type { UserRecord } from './types.js';

export interface UserStore {
  findUserById(id: string): Promise<UserRecord | null>;
}

export const createUserStore = (pool: Pool): UserStore => {
  const findUserById = async (id: string): Promise<UserRecord | null> => {
    const result = await pool.query<{
      id: string;
      username: string;
      is_active: boolean;
    }>(
      `SELECT id, username, is_active
         FROM app_user
        WHERE id = $1
        LIMIT 1`,
      [id],
    );

    if (result.rowCount === 0) {
      return null;
    }

    const row = result.rows[0];
    return {
      id: row.id,
      username: row.username,
      isActive: row.is_active,
    };
  };

  return {
    findUserById,
  };
};
