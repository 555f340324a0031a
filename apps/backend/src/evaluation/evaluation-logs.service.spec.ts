import { ConfigService } from '@nestjs/config';
import { DatabaseService } from '../database/database.service';
import { EvaluationLogsService, type EvaluationLogInput } from './evaluation-logs.service';

const entry = (overrides: Partial<EvaluationLogInput> = {}): EvaluationLogInput => ({
  kind: 'speaking-basic',
  providerName: 'ollama',
  model: 'test-model',
  status: 'OK',
  latencyMs: 120.4,
  inputLength: 42,
  ...overrides,
});

describe('EvaluationLogsService', () => {
  let database: DatabaseService;
  let service: EvaluationLogsService;

  beforeEach(() => {
    database = new DatabaseService(new ConfigService({ DATABASE_PATH: ':memory:' }));
    service = new EvaluationLogsService(database);
  });

  afterEach(() => {
    database.onModuleDestroy();
  });

  it('should store a call and list it newest first', () => {
    service.logCall(entry({ response: '{"a":1}' }));
    service.logCall(entry({ kind: 'writing-basic', status: 'ERROR', error: 'timed out' }));

    const page = service.listLogs({});

    expect(page.total).toBe(2);
    expect(page.page).toBe(1);
    expect(page.pageSize).toBe(20);
    expect(page.items[0]).toMatchObject({ kind: 'writing-basic', status: 'ERROR', error: 'timed out', response: null });
    expect(page.items[1]).toMatchObject({
      kind: 'speaking-basic',
      providerName: 'ollama',
      model: 'test-model',
      latencyMs: 120,
      inputLength: 42,
      response: '{"a":1}',
      error: null,
    });
  });

  it('should filter by kind and status', () => {
    service.logCall(entry());
    service.logCall(entry({ status: 'ERROR' }));
    service.logCall(entry({ kind: 'writing-enhanced', status: 'ERROR' }));

    expect(service.listLogs({ status: 'ERROR' }).total).toBe(2);
    expect(service.listLogs({ kind: 'speaking-basic', status: 'ERROR' }).total).toBe(1);
    expect(service.listLogs({ kind: 'writing-basic' }).items).toEqual([]);
  });

  it('should clamp paging', () => {
    for (let index = 0; index < 3; index += 1) {
      service.logCall(entry({ inputLength: index }));
    }

    const page = service.listLogs({ page: 2, pageSize: 0 });

    expect(page.pageSize).toBe(1);
    expect(page.items.map((item) => item.inputLength)).toEqual([1]);
    expect(service.listLogs({ pageSize: 500 }).pageSize).toBe(100);
  });

  it('should truncate long responses', () => {
    service.logCall(entry({ response: 'x'.repeat(25000) }));

    expect(service.listLogs({}).items[0].response).toHaveLength(20000);
  });
});
