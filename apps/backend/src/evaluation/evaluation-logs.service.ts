import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import type { EvaluationKind, ProviderName } from './evaluation.types';

export type EvaluationLogStatus = 'OK' | 'ERROR';

export type EvaluationLogInput = {
  kind: EvaluationKind;
  providerName: ProviderName;
  model: string;
  status: EvaluationLogStatus;
  latencyMs: number;
  inputLength: number;
  error?: string;
  response?: string;
};

export type EvaluationLogQuery = {
  page?: number;
  pageSize?: number;
  kind?: EvaluationKind;
  status?: EvaluationLogStatus;
};

export type EvaluationLogEntry = {
  id: number;
  createdAt: string;
  kind: string;
  providerName: string;
  model: string;
  status: string;
  latencyMs: number;
  inputLength: number;
  error: string | null;
  response: string | null;
};

export type EvaluationLogPage = {
  items: EvaluationLogEntry[];
  total: number;
  page: number;
  pageSize: number;
};

type EvaluationLogRow = {
  id: number;
  created_at: string;
  kind: string;
  provider_name: string;
  model: string;
  status: string;
  latency_ms: number;
  input_length: number;
  error: string | null;
  response: string | null;
};

type LogFilter = { kind: string | null; status: string | null };

const RESPONSE_LIMIT = 20000;

const trimText = (value?: string, limit = RESPONSE_LIMIT): string | null => {
  if (!value) {
    return null;
  }
  return value.length > limit ? value.slice(0, limit) : value;
};

const FILTER_CLAUSE = '(@kind IS NULL OR kind = @kind) AND (@status IS NULL OR status = @status)';

@Injectable()
export class EvaluationLogsService {
  constructor(private readonly database: DatabaseService) {}

  logCall(input: EvaluationLogInput): void {
    this.database.connection
      .prepare(
        `INSERT INTO evaluation_logs
           (created_at, kind, provider_name, model, status, latency_ms, input_length, error, response)
         VALUES (@createdAt, @kind, @providerName, @model, @status, @latencyMs, @inputLength, @error, @response)`,
      )
      .run({
        createdAt: new Date().toISOString(),
        kind: input.kind,
        providerName: input.providerName,
        model: input.model,
        status: input.status,
        latencyMs: Math.round(input.latencyMs),
        inputLength: input.inputLength,
        error: trimText(input.error),
        response: trimText(input.response),
      });
  }

  listLogs(query: EvaluationLogQuery): EvaluationLogPage {
    const pageSize = Math.min(Math.max(query.pageSize ?? 20, 1), 100);
    const page = Math.max(query.page ?? 1, 1);
    const filter: LogFilter = { kind: query.kind ?? null, status: query.status ?? null };
    const connection = this.database.connection;

    const { total } = connection
      .prepare<LogFilter, { total: number }>(`SELECT COUNT(*) AS total FROM evaluation_logs WHERE ${FILTER_CLAUSE}`)
      .get(filter) ?? { total: 0 };

    const rows = connection
      .prepare<LogFilter & { limit: number; offset: number }, EvaluationLogRow>(
        `SELECT * FROM evaluation_logs WHERE ${FILTER_CLAUSE}
         ORDER BY id DESC LIMIT @limit OFFSET @offset`,
      )
      .all({ ...filter, limit: pageSize, offset: (page - 1) * pageSize });

    return {
      items: rows.map((row) => ({
        id: row.id,
        createdAt: row.created_at,
        kind: row.kind,
        providerName: row.provider_name,
        model: row.model,
        status: row.status,
        latencyMs: row.latency_ms,
        inputLength: row.input_length,
        error: row.error,
        response: row.response,
      })),
      total,
      page,
      pageSize,
    };
  }
}
