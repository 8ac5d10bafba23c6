import type { Pool } from 'pg';

export interface DeviceTokenRecord {
  token: string;
  userId: string;
  platform: string;
}

export interface DeviceTokenStore {
  listActiveTokens(userId: string): Promise<DeviceTokenRecord[]>;
}

export const createDeviceTokenStore = (pool: Pool): DeviceTokenStore => ({
  async listActiveTokens(userId: string): Promise<DeviceTokenRecord[]> {
    const result = await pool.query<{ token: string; user_id: string; platform: string }>(
      `SELECT token, user_id, platform
         FROM device_token
        WHERE user_id = $1 AND is_active
        ORDER BY updated_at DESC`,
      [userId],
    );

    return result.rows.map((row) => ({
      token: row.token,
      userId: row.user_id,
      platform: row.platform,
    }));
  },
});
