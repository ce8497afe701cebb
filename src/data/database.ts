import { Pool, PoolClient, PoolConfig, QueryResultRow } from 'pg';
import type {
  AssetClass,
  CollectionStats,
  Country,
  FinancialRatio,
  FinancialStatement,
  IsoDate,
  ListingStatus,
  Market,
  MarketSnapshot,
  PricePoint,
  ReportType,
  SeriesStats,
  Ticker,
  TimeSeriesEntity,
} from '../types';
import { REPORT_TYPE_ORDER, uniqueBySymbol } from './store';
import type { AnalyticsStore, CollectionStore, TickerFilter } from './store';
import { logger, healthChecker, createDatabaseHealthCheck, DatabaseError, ErrorCode } from '../utils';

// Rows per multi-row INSERT
const INSERT_CHUNK_SIZE = 500;

const TIME_SERIES_TABLES: Record<TimeSeriesEntity, string> = {
  prices: 'price_points',
  snapshots: 'market_snapshots',
};

interface TickerRow {
  symbol: string;
  name: string;
  market: Market;
  country: Country;
  asset_class: AssetClass;
  status: ListingStatus;
  sector: string | null;
  industry: string | null;
  isin: string | null;
}

interface PriceRow {
  symbol: string;
  trade_date: string;
  open: string;
  high: string;
  low: string;
  close: string;
  volume: string;
}

interface SnapshotRow {
  symbol: string;
  trade_date: string;
  market_cap: string | null;
  shares_outstanding: string | null;
  traded_value: string | null;
}

interface StatementRow {
  symbol: string;
  fiscal_year: number;
  report_type: ReportType;
  fiscal_quarter: number | null;
  report_date: string | null;
  currency: string;
  revenue: string | null;
  operating_income: string | null;
  net_income: string | null;
  total_assets: string | null;
  total_liabilities: string | null;
  total_equity: string | null;
  operating_cash_flow: string | null;
  investing_cash_flow: string | null;
  financing_cash_flow: string | null;
}

interface RatioRow {
  symbol: string;
  fiscal_year: number;
  report_type: ReportType;
  fiscal_date: string;
  roe: string | null;
  roa: string | null;
  operating_margin: string | null;
  net_margin: string | null;
  debt_ratio: string | null;
  per: string | null;
  pbr: string | null;
  psr: string | null;
}

function numOrNull(value: string | number | null): number | null {
  if (value === null) return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

function toQuarter(value: number | null): 1 | 2 | 3 | null {
  return value === 1 || value === 2 || value === 3 ? value : null;
}

/** `($1, $2, ...), ($n+1, ...)` for a chunk of rows of `width` columns. */
function valuesPlaceholders(rowCount: number, width: number): string {
  const groups: string[] = [];
  for (let r = 0; r < rowCount; r++) {
    const cols: string[] = [];
    for (let c = 1; c <= width; c++) {
      cols.push(`$${r * width + c}`);
    }
    groups.push(`(${cols.join(', ')})`);
  }
  return groups.join(', ');
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export class Database implements CollectionStore, AnalyticsStore {
  private pool: Pool;
  private readonly connectionString: string;

  constructor(connectionString: string) {
    this.connectionString = connectionString;
    const poolConfig: PoolConfig = {
      connectionString,
      ssl: process.env.NODE_ENV === 'production' ? { rejectUnauthorized: false } : false,
      max: parseInt(process.env.DB_POOL_MAX || '10', 10),
      min: parseInt(process.env.DB_POOL_MIN || '1', 10),
      idleTimeoutMillis: parseInt(process.env.DB_IDLE_TIMEOUT || '30000', 10),
      connectionTimeoutMillis: parseInt(process.env.DB_CONNECT_TIMEOUT || '5000', 10),
      keepAlive: true,
      keepAliveInitialDelayMillis: 10000,
    };

    this.pool = new Pool(poolConfig);

    this.pool.on('error', (err) => {
      logger.error('Database', 'Unexpected pool error', { error: err.message });
    });

    this.pool.on('connect', () => {
      logger.debug('Database', 'New client connected to pool');
    });

    this.pool.on('remove', () => {
      logger.debug('Database', 'Client removed from pool');
    });

    healthChecker.registerCheck('database', createDatabaseHealthCheck(this.pool));
  }

  async connect(): Promise<void> {
    const maskedUrl = this.connectionString.replace(/:[^:@/]+@/, ':***@');
    logger.info('Database', 'Connecting', { url: maskedUrl });

    try {
      await this.pool.query('SELECT 1');
      logger.info('Database', 'Connected to PostgreSQL', {
        poolSize: this.pool.totalCount,
        idleCount: this.pool.idleCount,
      });
    } catch (error) {
      logger.error('Database', 'Failed to connect to PostgreSQL', {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw new DatabaseError('Failed to connect to database', { url: maskedUrl });
    }
  }

  async disconnect(): Promise<void> {
    await this.pool.end();
    logger.info('Database', 'Disconnected from PostgreSQL');
  }

  getPool(): Pool {
    return this.pool;
  }

  async query<T extends QueryResultRow>(sql: string, params?: unknown[]): Promise<{ rows: T[] }> {
    try {
      const result = await this.pool.query<T>(sql, params);
      return { rows: result.rows };
    } catch (error) {
      throw new DatabaseError(error instanceof Error ? error.message : 'Query failed', undefined, ErrorCode.DB_QUERY_ERROR);
    }
  }

  private async transaction<T>(work: (client: PoolClient) => Promise<T>): Promise<T> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw new DatabaseError(error instanceof Error ? error.message : 'Connection failed');
    }

    try {
      await client.query('BEGIN');
      const result = await work(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw new DatabaseError(
        error instanceof Error ? error.message : 'Transaction failed',
        undefined,
        ErrorCode.DB_TRANSACTION_ERROR
      );
    } finally {
      client.release();
    }
  }

  // ===== TICKERS =====

  async upsertTickers(tickers: Ticker[]): Promise<number> {
    const unique = uniqueBySymbol(tickers);
    if (unique.length === 0) return 0;

    return this.transaction(async (client) => {
      let written = 0;
      for (const batch of chunk(unique, INSERT_CHUNK_SIZE)) {
        const params = batch.flatMap((t) => [
          t.symbol,
          t.name,
          t.market,
          t.country,
          t.assetClass,
          t.status,
          t.sector ?? null,
          t.industry ?? null,
          t.isin ?? null,
        ]);
        const result = await client.query(
          `INSERT INTO tickers (symbol, name, market, country, asset_class, status, sector, industry, isin)
           VALUES ${valuesPlaceholders(batch.length, 9)}
           ON CONFLICT (symbol) DO UPDATE SET
           name = EXCLUDED.name, market = EXCLUDED.market, asset_class = EXCLUDED.asset_class,
           status = EXCLUDED.status,
           sector = COALESCE(EXCLUDED.sector, tickers.sector),
           industry = COALESCE(EXCLUDED.industry, tickers.industry),
           isin = COALESCE(EXCLUDED.isin, tickers.isin),
           updated_at = NOW()`,
          params
        );
        written += result.rowCount ?? 0;
      }
      return written;
    });
  }

  async markInactive(market: Market, listedSymbols: string[]): Promise<number> {
    const result = await this.pool.query(
      `UPDATE tickers SET status = 'inactive', updated_at = NOW()
       WHERE market = $1 AND status = 'active' AND NOT (symbol = ANY($2::text[]))`,
      [market, listedSymbols]
    );
    return result.rowCount ?? 0;
  }

  async listTickers(filter: TickerFilter = {}): Promise<Ticker[]> {
    const clauses: string[] = [];
    const params: unknown[] = [];

    if (filter.markets && filter.markets.length > 0) {
      params.push(filter.markets);
      clauses.push(`market = ANY($${params.length}::text[])`);
    }
    if (filter.symbols) {
      params.push(filter.symbols);
      clauses.push(`symbol = ANY($${params.length}::text[])`);
    }
    if (filter.status) {
      params.push(filter.status);
      clauses.push(`status = $${params.length}`);
    }

    let sql = `SELECT symbol, name, market, country, asset_class, status, sector, industry, isin FROM tickers`;
    if (clauses.length > 0) {
      sql += ` WHERE ${clauses.join(' AND ')}`;
    }
    sql += ' ORDER BY symbol';
    if (filter.limit !== undefined) {
      params.push(filter.limit);
      sql += ` LIMIT $${params.length}`;
    }

    const { rows } = await this.query<TickerRow>(sql, params);
    return rows.map((r) => ({
      symbol: r.symbol,
      name: r.name,
      market: r.market,
      country: r.country,
      assetClass: r.asset_class,
      status: r.status,
      sector: r.sector,
      industry: r.industry,
      isin: r.isin,
    }));
  }

  // ===== TIME SERIES =====

  async queryLastDate(symbol: string, entity: TimeSeriesEntity): Promise<IsoDate | null> {
    const { rows } = await this.query<{ last_date: string | null }>(
      `SELECT to_char(MAX(trade_date), 'YYYY-MM-DD') AS last_date FROM ${TIME_SERIES_TABLES[entity]} WHERE symbol = $1`,
      [symbol]
    );
    return rows[0]?.last_date ?? null;
  }

  async upsertPricePoints(points: PricePoint[]): Promise<number> {
    if (points.length === 0) return 0;

    return this.transaction(async (client) => {
      let inserted = 0;
      for (const batch of chunk(points, INSERT_CHUNK_SIZE)) {
        const params = batch.flatMap((p) => [p.symbol, p.tradeDate, p.open, p.high, p.low, p.close, p.volume]);
        const result = await client.query(
          `INSERT INTO price_points (symbol, trade_date, open, high, low, close, volume)
           VALUES ${valuesPlaceholders(batch.length, 7)}
           ON CONFLICT (symbol, trade_date) DO NOTHING`,
          params
        );
        inserted += result.rowCount ?? 0;
      }
      return inserted;
    });
  }

  async upsertSnapshots(snapshots: MarketSnapshot[]): Promise<number> {
    if (snapshots.length === 0) return 0;

    return this.transaction(async (client) => {
      let inserted = 0;
      for (const batch of chunk(snapshots, INSERT_CHUNK_SIZE)) {
        const params = batch.flatMap((s) => [s.symbol, s.tradeDate, s.marketCap, s.sharesOutstanding, s.tradedValue]);
        const result = await client.query(
          `INSERT INTO market_snapshots (symbol, trade_date, market_cap, shares_outstanding, traded_value)
           VALUES ${valuesPlaceholders(batch.length, 5)}
           ON CONFLICT (symbol, trade_date) DO NOTHING`,
          params
        );
        inserted += result.rowCount ?? 0;
      }
      return inserted;
    });
  }

  async getPriceSeries(symbol: string, from: IsoDate, to: IsoDate): Promise<PricePoint[]> {
    const { rows } = await this.query<PriceRow>(
      `SELECT symbol, to_char(trade_date, 'YYYY-MM-DD') AS trade_date, open, high, low, close, volume
       FROM price_points WHERE symbol = $1 AND trade_date BETWEEN $2 AND $3
       ORDER BY trade_date ASC`,
      [symbol, from, to]
    );
    return rows.map((r) => ({
      symbol: r.symbol,
      tradeDate: r.trade_date,
      open: Number(r.open),
      high: Number(r.high),
      low: Number(r.low),
      close: Number(r.close),
      volume: Number(r.volume),
    }));
  }

  async findMarketCapSnapshot(symbol: string, onOrBefore: IsoDate, notBefore: IsoDate): Promise<MarketSnapshot | null> {
    const { rows } = await this.query<SnapshotRow>(
      `SELECT symbol, to_char(trade_date, 'YYYY-MM-DD') AS trade_date, market_cap, shares_outstanding, traded_value
       FROM market_snapshots
       WHERE symbol = $1 AND trade_date <= $2 AND trade_date >= $3 AND market_cap > 0
       ORDER BY trade_date DESC LIMIT 1`,
      [symbol, onOrBefore, notBefore]
    );
    const row = rows[0];
    if (!row) return null;
    return {
      symbol: row.symbol,
      tradeDate: row.trade_date,
      marketCap: numOrNull(row.market_cap),
      sharesOutstanding: numOrNull(row.shares_outstanding),
      tradedValue: numOrNull(row.traded_value),
    };
  }

  async countObservations(entity: TimeSeriesEntity, symbols: string[], from: IsoDate, to: IsoDate): Promise<number> {
    if (symbols.length === 0) return 0;
    const { rows } = await this.query<{ count: string }>(
      `SELECT COUNT(*) AS count FROM ${TIME_SERIES_TABLES[entity]}
       WHERE symbol = ANY($1::text[]) AND trade_date BETWEEN $2 AND $3`,
      [symbols, from, to]
    );
    return Number(rows[0]?.count ?? 0);
  }

  async listSymbolsWithMarketCap(symbols: string[]): Promise<string[]> {
    if (symbols.length === 0) return [];
    const { rows } = await this.query<{ symbol: string }>(
      `SELECT DISTINCT symbol FROM market_snapshots
       WHERE symbol = ANY($1::text[]) AND market_cap > 0 ORDER BY symbol`,
      [symbols]
    );
    return rows.map((r) => r.symbol);
  }

  // ===== FINANCIAL STATEMENTS =====

  async queryLastFiscalYear(symbol: string, reportType: ReportType): Promise<number | null> {
    const { rows } = await this.query<{ last_year: number | null }>(
      `SELECT MAX(fiscal_year) AS last_year FROM financial_statements WHERE symbol = $1 AND report_type = $2`,
      [symbol, reportType]
    );
    return rows[0]?.last_year ?? null;
  }

  async upsertStatement(s: FinancialStatement): Promise<void> {
    await this.query(
      `INSERT INTO financial_statements (
         symbol, fiscal_year, report_type, fiscal_quarter, report_date, currency,
         revenue, operating_income, net_income, total_assets, total_liabilities, total_equity,
         operating_cash_flow, investing_cash_flow, financing_cash_flow)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15)
       ON CONFLICT (symbol, fiscal_year, report_type) DO UPDATE SET
       fiscal_quarter = EXCLUDED.fiscal_quarter, report_date = EXCLUDED.report_date, currency = EXCLUDED.currency,
       revenue = EXCLUDED.revenue, operating_income = EXCLUDED.operating_income, net_income = EXCLUDED.net_income,
       total_assets = EXCLUDED.total_assets, total_liabilities = EXCLUDED.total_liabilities,
       total_equity = EXCLUDED.total_equity, operating_cash_flow = EXCLUDED.operating_cash_flow,
       investing_cash_flow = EXCLUDED.investing_cash_flow, financing_cash_flow = EXCLUDED.financing_cash_flow,
       updated_at = NOW()`,
      [
        s.symbol, s.fiscalYear, s.reportType, s.fiscalQuarter, s.reportDate, s.currency,
        s.revenue, s.operatingIncome, s.netIncome, s.totalAssets, s.totalLiabilities, s.totalEquity,
        s.operatingCashFlow, s.investingCashFlow, s.financingCashFlow,
      ]
    );
  }

  async getStatements(symbol: string): Promise<FinancialStatement[]> {
    const { rows } = await this.query<StatementRow>(
      `SELECT symbol, fiscal_year, report_type, fiscal_quarter, to_char(report_date, 'YYYY-MM-DD') AS report_date,
              currency, revenue, operating_income, net_income, total_assets, total_liabilities, total_equity,
              operating_cash_flow, investing_cash_flow, financing_cash_flow
       FROM financial_statements WHERE symbol = $1
       ORDER BY fiscal_year DESC, report_type`,
      [symbol]
    );
    return rows.map((r) => ({
      symbol: r.symbol,
      fiscalYear: r.fiscal_year,
      reportType: r.report_type,
      fiscalQuarter: toQuarter(r.fiscal_quarter),
      reportDate: r.report_date,
      currency: r.currency,
      revenue: numOrNull(r.revenue),
      operatingIncome: numOrNull(r.operating_income),
      netIncome: numOrNull(r.net_income),
      totalAssets: numOrNull(r.total_assets),
      totalLiabilities: numOrNull(r.total_liabilities),
      totalEquity: numOrNull(r.total_equity),
      operatingCashFlow: numOrNull(r.operating_cash_flow),
      investingCashFlow: numOrNull(r.investing_cash_flow),
      financingCashFlow: numOrNull(r.financing_cash_flow),
    }));
  }

  async countStatements(symbols: string[], fromYear: number, toYear: number, reportType: ReportType): Promise<number> {
    if (symbols.length === 0) return 0;
    const { rows } = await this.query<{ count: string }>(
      `SELECT COUNT(*) AS count FROM financial_statements
       WHERE symbol = ANY($1::text[]) AND fiscal_year BETWEEN $2 AND $3 AND report_type = $4`,
      [symbols, fromYear, toYear, reportType]
    );
    return Number(rows[0]?.count ?? 0);
  }

  async listSymbolsWithStatements(symbols: string[]): Promise<string[]> {
    if (symbols.length === 0) return [];
    const { rows } = await this.query<{ symbol: string }>(
      `SELECT DISTINCT symbol FROM financial_statements WHERE symbol = ANY($1::text[]) ORDER BY symbol`,
      [symbols]
    );
    return rows.map((r) => r.symbol);
  }

  // ===== FINANCIAL RATIOS =====

  async upsertRatio(r: FinancialRatio): Promise<void> {
    await this.query(
      `INSERT INTO financial_ratios (
         symbol, fiscal_year, report_type, fiscal_date,
         roe, roa, operating_margin, net_margin, debt_ratio, per, pbr, psr)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
       ON CONFLICT (symbol, fiscal_year, report_type) DO UPDATE SET
       fiscal_date = EXCLUDED.fiscal_date, roe = EXCLUDED.roe, roa = EXCLUDED.roa,
       operating_margin = EXCLUDED.operating_margin, net_margin = EXCLUDED.net_margin,
       debt_ratio = EXCLUDED.debt_ratio, per = EXCLUDED.per, pbr = EXCLUDED.pbr, psr = EXCLUDED.psr,
       calculated_at = NOW()`,
      [
        r.symbol, r.fiscalYear, r.reportType, r.fiscalDate,
        r.roe, r.roa, r.operatingMargin, r.netMargin, r.debtRatio, r.per, r.pbr, r.psr,
      ]
    );
  }

  async getRatios(symbols: string[]): Promise<FinancialRatio[]> {
    if (symbols.length === 0) return [];
    const { rows } = await this.query<RatioRow>(
      `SELECT symbol, fiscal_year, report_type, to_char(fiscal_date, 'YYYY-MM-DD') AS fiscal_date,
              roe, roa, operating_margin, net_margin, debt_ratio, per, pbr, psr
       FROM financial_ratios WHERE symbol = ANY($1::text[])
       ORDER BY symbol, fiscal_year DESC, report_type`,
      [symbols]
    );
    return rows.map((r) => ({
      symbol: r.symbol,
      fiscalYear: r.fiscal_year,
      reportType: r.report_type,
      fiscalDate: r.fiscal_date,
      roe: numOrNull(r.roe),
      roa: numOrNull(r.roa),
      operatingMargin: numOrNull(r.operating_margin),
      netMargin: numOrNull(r.net_margin),
      debtRatio: numOrNull(r.debt_ratio),
      per: numOrNull(r.per),
      pbr: numOrNull(r.pbr),
      psr: numOrNull(r.psr),
    }));
  }

  // ===== STATISTICS =====

  async collectionStats(): Promise<CollectionStats> {
    const [tickers, prices, snapshots, statements, ratios] = await Promise.all([
      this.query<{ market: Market; active: string; inactive: string }>(
        `SELECT market,
                COUNT(*) FILTER (WHERE status = 'active') AS active,
                COUNT(*) FILTER (WHERE status <> 'active') AS inactive
         FROM tickers GROUP BY market`
      ),
      this.seriesStats('prices'),
      this.seriesStats('snapshots'),
      this.query<{ report_type: ReportType; row_count: string; symbol_count: string; latest_year: number | null }>(
        `SELECT report_type, COUNT(*) AS row_count, COUNT(DISTINCT symbol) AS symbol_count,
                MAX(fiscal_year) AS latest_year
         FROM financial_statements GROUP BY report_type`
      ),
      this.query<{ row_count: string; symbol_count: string }>(
        `SELECT COUNT(*) AS row_count, COUNT(DISTINCT symbol) AS symbol_count FROM financial_ratios`
      ),
    ]);

    return {
      tickers: tickers.rows
        .map((r) => ({ market: r.market, active: Number(r.active), inactive: Number(r.inactive) }))
        .sort((a, b) => (a.market < b.market ? -1 : 1)),
      prices,
      snapshots,
      statements: REPORT_TYPE_ORDER.flatMap((reportType) => {
        const row = statements.rows.find((r) => r.report_type === reportType);
        if (!row) return [];
        return [
          { reportType, rows: Number(row.row_count), symbols: Number(row.symbol_count), latestFiscalYear: row.latest_year },
        ];
      }),
      ratios: { rows: Number(ratios.rows[0]?.row_count ?? 0), symbols: Number(ratios.rows[0]?.symbol_count ?? 0) },
    };
  }

  private async seriesStats(entity: TimeSeriesEntity): Promise<SeriesStats> {
    const { rows } = await this.query<{ row_count: string; symbol_count: string; latest_date: string | null }>(
      `SELECT COUNT(*) AS row_count, COUNT(DISTINCT symbol) AS symbol_count,
              to_char(MAX(trade_date), 'YYYY-MM-DD') AS latest_date
       FROM ${TIME_SERIES_TABLES[entity]}`
    );
    return {
      rows: Number(rows[0]?.row_count ?? 0),
      symbols: Number(rows[0]?.symbol_count ?? 0),
      latestDate: rows[0]?.latest_date ?? null,
    };
  }
}
