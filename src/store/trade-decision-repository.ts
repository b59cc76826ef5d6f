import Database from "better-sqlite3";
import type { Statement } from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import type {
  NewTradeDecision,
  ReflectionUpdate,
  ResultType,
  TradeDecision,
} from "../types";
import { HOUR_MS } from "../reflection/price-window";
import { logger } from "../utils/logger";

const TABLE = "trading_decisions";

/** SQLite busy timeout in milliseconds */
const BUSY_TIMEOUT_MS = 5000;

// Reflection columns added after the first release; older databases get them on open
const REFLECTION_COLUMNS: ReadonlyArray<[name: string, ddl: string]> = [
  ["reflection_timestamp", "TEXT DEFAULT ''"],
  ["result_type", "TEXT DEFAULT ''"],
  ["result_description", "TEXT DEFAULT ''"],
  ["reflection", "TEXT DEFAULT ''"],
  ["profit_loss", "REAL"],
];

interface TradeDecisionRow {
  id: number;
  timestamp: string;
  decision: string;
  confidence_score: number | null;
  reason: string | null;
  coin_name: string;
  coin_balance: number | null;
  krw_balance: number | null;
  coin_avg_buy_price: number | null;
  coin_krw_price: number | null;
  trade_amount: number | null;
  is_real_trade: number | null;
  reflection_timestamp: string | null;
  result_type: string | null;
  result_description: string | null;
  reflection: string | null;
  profit_loss: number | null;
}

type InsertParams = Omit<
  TradeDecisionRow,
  | "id"
  | "reflection_timestamp"
  | "result_type"
  | "result_description"
  | "reflection"
  | "profit_loss"
>;

interface RecentParams {
  coinName: string | null;
  limit: number;
}

interface CoinParams {
  coinName: string | null;
}

interface TimestampRow {
  id: number;
  timestamp: string;
}

interface UpdateParams {
  id: number;
  reflectionTimestamp: string;
  resultType: string;
  resultDescription: string;
  reflection: string;
  profitLoss: number;
}

interface Statements {
  insert: Statement<[InsertParams], TradeDecisionRow>;
  selectById: Statement<[number], TradeDecisionRow>;
  selectRecent: Statement<[RecentParams], TradeDecisionRow>;
  selectAll: Statement<[CoinParams], TradeDecisionRow>;
  selectUnreflected: Statement<[CoinParams], TradeDecisionRow>;
  updateReflection: Statement<[UpdateParams]>;
}

export interface TradeDecisionRepositoryOptions {
  now?: () => Date;
}

/**
 * SQLite store of trade decisions and their reflections.
 *
 * Timestamps are written as UTC ISO-8601 (`toISOString()`). Rows from older
 * writers may carry zone-less local times; age filters therefore compare
 * parsed instants, never the stored text.
 */
export class TradeDecisionRepository {
  private db: Database.Database | null = null;
  private statements: Statements | null = null;
  private now: () => Date;

  constructor(
    private dbPath: string,
    options: TradeDecisionRepositoryOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  private get stmts(): Statements {
    if (!this.statements) {
      throw new Error("TradeDecisionRepository not initialized. Call initialize() first.");
    }
    return this.statements;
  }

  /**
   * Open the database, create the table and add any missing reflection columns.
   */
  public initialize(): void {
    if (this.db) return;

    if (this.dbPath !== ":memory:") {
      mkdirSync(dirname(this.dbPath), { recursive: true });
    }

    const db = new Database(this.dbPath);
    db.pragma("journal_mode = WAL");
    db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);

    db.exec(`
      CREATE TABLE IF NOT EXISTS ${TABLE} (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp TEXT NOT NULL,
        decision TEXT NOT NULL,
        confidence_score REAL,
        reason TEXT,
        coin_name TEXT NOT NULL,
        coin_balance REAL,
        krw_balance REAL,
        coin_avg_buy_price REAL,
        coin_krw_price REAL,
        trade_amount REAL,
        is_real_trade INTEGER
      )
    `);

    const existing = new Set(
      db
        .prepare<[], { name: string }>(`PRAGMA table_info(${TABLE})`)
        .all()
        .map(col => col.name)
    );
    for (const [name, ddl] of REFLECTION_COLUMNS) {
      if (!existing.has(name)) {
        db.exec(`ALTER TABLE ${TABLE} ADD COLUMN ${name} ${ddl}`);
      }
    }

    const normalized = normalizeLegacyTimestamps(db);
    if (normalized > 0) {
      logger.info(`[TradeStore] 已将 ${normalized} 条无时区的旧记录时间戳转换为 UTC`);
    }

    this.db = db;
    this.statements = this.prepareStatements(db);
  }

  private prepareStatements(db: Database.Database): Statements {
    return {
      insert: db.prepare<InsertParams, TradeDecisionRow>(`
        INSERT INTO ${TABLE} (
          timestamp, decision, confidence_score, reason, coin_name, coin_balance,
          krw_balance, coin_avg_buy_price, coin_krw_price, trade_amount, is_real_trade
        ) VALUES (
          @timestamp, @decision, @confidence_score, @reason, @coin_name, @coin_balance,
          @krw_balance, @coin_avg_buy_price, @coin_krw_price, @trade_amount, @is_real_trade
        )
      `),
      selectById: db.prepare<[number], TradeDecisionRow>(`SELECT * FROM ${TABLE} WHERE id = ?`),
      selectRecent: db.prepare<RecentParams, TradeDecisionRow>(`
        SELECT * FROM ${TABLE}
        WHERE (@coinName IS NULL OR coin_name = @coinName)
        ORDER BY timestamp DESC, id DESC
        LIMIT @limit
      `),
      selectAll: db.prepare<CoinParams, TradeDecisionRow>(`
        SELECT * FROM ${TABLE}
        WHERE (@coinName IS NULL OR coin_name = @coinName)
        ORDER BY timestamp DESC, id DESC
      `),
      selectUnreflected: db.prepare<CoinParams, TradeDecisionRow>(`
        SELECT * FROM ${TABLE}
        WHERE (reflection = '' OR reflection IS NULL)
          AND (@coinName IS NULL OR coin_name = @coinName)
      `),
      updateReflection: db.prepare<UpdateParams>(`
        UPDATE ${TABLE}
        SET reflection_timestamp = @reflectionTimestamp,
            result_type = @resultType,
            result_description = @resultDescription,
            reflection = @reflection,
            profit_loss = @profitLoss
        WHERE id = @id
      `),
    };
  }

  public close(): void {
    this.db?.close();
    this.db = null;
    this.statements = null;
  }

  /**
   * Record a new decision. Returns the assigned id.
   */
  public insertDecision(input: NewTradeDecision): number {
    const timestamp = normalizeTimestamp(input.timestamp ?? this.now().toISOString());

    const result = this.stmts.insert.run({
      timestamp,
      decision: input.decision,
      confidence_score: input.confidenceScore ?? null,
      reason: input.reason ?? null,
      coin_name: input.coinName,
      coin_balance: input.coinBalance ?? null,
      krw_balance: input.krwBalance ?? null,
      coin_avg_buy_price: input.coinAvgBuyPrice ?? null,
      coin_krw_price: input.coinKrwPrice ?? null,
      trade_amount: input.tradeAmount ?? null,
      is_real_trade:
        input.isRealTrade === undefined || input.isRealTrade === null
          ? null
          : input.isRealTrade
            ? 1
            : 0,
    });

    return Number(result.lastInsertRowid);
  }

  public getDecisionById(id: number): TradeDecision | null {
    const row = this.stmts.selectById.get(id);
    return row ? rowToDecision(row) : null;
  }

  public getRecentDecisions(limit: number = 10, coinName?: string): TradeDecision[] {
    return this.stmts.selectRecent
      .all({ coinName: coinName ?? null, limit })
      .map(rowToDecision);
  }

  public getAllDecisions(coinName?: string): TradeDecision[] {
    return this.stmts.selectAll.all({ coinName: coinName ?? null }).map(rowToDecision);
  }

  /**
   * Unreflected decisions older than `minHoursOld`, oldest first.
   * A `minHoursOld` of 0 or null disables the age filter; rows whose timestamp
   * cannot be parsed are then listed last so the pipeline can report them.
   */
  public selectEligible(
    coinName?: string | null,
    minHoursOld: number | null = 24
  ): TradeDecision[] {
    const cutoffMs = minHoursOld ? this.now().getTime() - minHoursOld * HOUR_MS : null;

    return this.stmts.selectUnreflected
      .all({ coinName: coinName ?? null })
      .map(row => ({ row, ms: Date.parse(row.timestamp) }))
      .filter(({ ms }) => cutoffMs === null || ms < cutoffMs)
      .sort(byInstantThenId)
      .map(({ row }) => rowToDecision(row));
  }

  /**
   * Write the five reflection fields of one decision in a single UPDATE.
   * Returns false when no decision has that id; nothing is inserted.
   */
  public updateReflection(id: number, update: ReflectionUpdate): boolean {
    const result = this.stmts.updateReflection.run({ id, ...update });
    return result.changes > 0;
  }
}

// Zone-less timestamps from older writers have neither a trailing Z nor a ±HH:MM offset
const ZONE_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2})$/i;

/**
 * 把旧版写入的本地时间（无时区）改写为 UTC ISO 字符串，单个事务内完成。
 * 无法解析的时间戳保持原样。
 */
function normalizeLegacyTimestamps(db: Database.Database): number {
  const rows = db
    .prepare<[], TimestampRow>(`SELECT id, timestamp FROM ${TABLE}`)
    .all()
    .filter(row => !ZONE_SUFFIX.test(row.timestamp.trim()));
  if (rows.length === 0) return 0;

  const update = db.prepare<[string, number]>(
    `UPDATE ${TABLE} SET timestamp = ? WHERE id = ?`
  );
  let changed = 0;
  db.transaction((legacy: TimestampRow[]) => {
    for (const row of legacy) {
      const ms = Date.parse(row.timestamp);
      if (Number.isNaN(ms)) continue;
      update.run(new Date(ms).toISOString(), row.id);
      changed++;
    }
  })(rows);
  return changed;
}

function byInstantThenId(
  a: { row: TradeDecisionRow; ms: number },
  b: { row: TradeDecisionRow; ms: number }
): number {
  const aValid = !Number.isNaN(a.ms);
  const bValid = !Number.isNaN(b.ms);
  if (aValid !== bValid) return aValid ? -1 : 1;
  if (aValid && a.ms !== b.ms) return a.ms - b.ms;
  return a.row.id - b.row.id;
}

function normalizeTimestamp(timestamp: string): string {
  const ms = Date.parse(timestamp);
  if (Number.isNaN(ms)) {
    throw new Error(`Invalid decision timestamp: ${timestamp}`);
  }
  return new Date(ms).toISOString();
}

function toResultType(raw: string | null): ResultType | "" {
  if (raw === "gain" || raw === "loss" || raw === "neutral") return raw;
  return "";
}

function rowToDecision(row: TradeDecisionRow): TradeDecision {
  return {
    id: row.id,
    timestamp: row.timestamp,
    decision: row.decision,
    confidenceScore: row.confidence_score,
    reason: row.reason,
    coinName: row.coin_name,
    coinBalance: row.coin_balance,
    krwBalance: row.krw_balance,
    coinAvgBuyPrice: row.coin_avg_buy_price,
    coinKrwPrice: row.coin_krw_price,
    tradeAmount: row.trade_amount,
    isRealTrade: row.is_real_trade === null ? null : row.is_real_trade === 1,
    reflectionTimestamp: row.reflection_timestamp ?? "",
    resultType: toResultType(row.result_type),
    resultDescription: row.result_description ?? "",
    reflection: row.reflection ?? "",
    profitLoss: row.profit_loss,
  };
}
