import { z } from "zod";
import type { ScheduleConfig } from "../types.js";
import type { ConfigStore, Queryable } from "./types.js";

const ConfigRow = z.object({
  tenant_id: z.string(),
  summary_channel: z.string(),
  summary_message: z.string(),
  briefing_source: z.string().nullable(),
});

export class PgConfigStore implements ConfigStore {
  constructor(private readonly db: Queryable) {}

  async getScheduleConfig(tenantId: string): Promise<ScheduleConfig | null> {
    const res = await this.db.query(
      `SELECT tenant_id, summary_channel, summary_message, briefing_source
       FROM schedule_config WHERE tenant_id = $1`,
      [tenantId],
    );
    if (!res.rows.length) return null;
    const r = ConfigRow.parse(res.rows[0]);
    return {
      tenantId: r.tenant_id,
      summaryChannel: r.summary_channel,
      summaryMessage: r.summary_message,
      briefingSource: r.briefing_source,
    };
  }

  async setScheduleConfig(config: ScheduleConfig) {
    await this.db.query(
      `INSERT INTO schedule_config (tenant_id, summary_channel, summary_message, briefing_source)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (tenant_id) DO UPDATE
         SET summary_channel = $2, summary_message = $3, briefing_source = $4`,
      [
        config.tenantId,
        config.summaryChannel,
        config.summaryMessage,
        config.briefingSource,
      ],
    );
  }
}
