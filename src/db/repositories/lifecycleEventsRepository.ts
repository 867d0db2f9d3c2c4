import type { Queryable } from './queryable.js'
import type { RecordedEvent } from '../../types/lifecycle.js'
import { toJson } from '../../utils/json.js'

type LastSequenceRow = {
  last_sequence: string | number
}

export class LifecycleEventsRepository {
  constructor(private readonly db: Queryable) {}

  /**
   * Appends a committed event. Replaying an already journaled sequence is a no-op.
   * @returns false when the sequence was already present
   */
  async append(event: RecordedEvent): Promise<boolean> {
    const result = await this.db.query(
      `
      INSERT INTO lifecycle_events (sequence, type, payload, occurred_at)
      VALUES ($1, $2, $3::jsonb, $4)
      ON CONFLICT (sequence) DO NOTHING
      `,
      [event.sequence, event.type, toJson(event), event.at]
    )

    return (result.rowCount ?? 0) > 0
  }

  /** Highest journaled sequence, 0 for an empty journal. */
  async lastSequence(): Promise<number> {
    const result = await this.db.query<LastSequenceRow>(
      `
      SELECT COALESCE(MAX(sequence), 0) AS last_sequence
      FROM lifecycle_events
      `
    )

    return Number(result.rows[0]?.last_sequence ?? 0)
  }
}
