/**
 * JSONL 실행 로거 테스트
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RunLogger, createRunId, getLogger, resetLogger } from '../core/logging/logger';

describe('RunLogger', () => {
  let logsDir: string;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    logsDir = fs.mkdtempSync(path.join(os.tmpdir(), 'uav-logs-'));
  });

  afterEach(() => {
    resetLogger();
    jest.restoreAllMocks();
    fs.rmSync(logsDir, { recursive: true, force: true });
  });

  function readEvents(file: string): Array<Record<string, unknown>> {
    return fs
      .readFileSync(file, 'utf-8')
      .trim()
      .split('\n')
      .map((line) => JSON.parse(line));
  }

  it('실행 ID 는 RUN- 접두사 + 8자리 대문자 16진수여야 함', () => {
    expect(createRunId()).toMatch(/^RUN-[0-9A-F]{8}$/);
  });

  it('이벤트를 한 줄에 하나씩 JSONL 로 기록해야 함', () => {
    const logger = new RunLogger({ logsDir, customFilename: 'run.jsonl' });

    logger.startRun('scenario.json', 'RUN-TEST0001');
    logger.log({ event: 'drone_created', drone_id: 'drone1', pattern: 'STATIC', sample_count: 3 });
    logger.log({ event: 'group_skipped', group: 'Weather' });
    logger.endRun();

    const file = path.join(logsDir, 'run.jsonl');
    expect(logger.getCurrentLogFile()).toBe(file);

    const events = readEvents(file);
    expect(events.map((e) => e.event)).toEqual(['run_start', 'drone_created', 'group_skipped', 'run_end']);
    expect(events[0]).toMatchObject({ run_id: 'RUN-TEST0001', run_file: 'scenario.json' });
    expect(events[1]).toMatchObject({ drone_id: 'drone1', pattern: 'STATIC', sample_count: 3 });
    expect(typeof events[1].timestamp).toBe('number');
    expect(events[3]).toMatchObject({
      run_id: 'RUN-TEST0001',
      summary: {
        drones_created: 1,
        drones_by_pattern: { STATIC: 1 },
        vehicles_removed: 0,
        exports_written: 0,
        groups_skipped: 1,
      },
    });
  });

  it('비활성화 상태에서는 파일을 만들지 않고 통계만 유지해야 함', () => {
    const logger = new RunLogger({ logsDir, enabled: false });

    logger.startRun(null);
    logger.log({ event: 'vehicle_removed', vehicle_id: 'veh0' });
    logger.log({ event: 'trace_exported', output_path: 'out.xml', geo: true, vehicle_count: 2 });

    expect(logger.getCurrentLogFile()).toBeNull();
    expect(fs.readdirSync(logsDir)).toEqual([]);
    expect(logger.getStats()).toMatchObject({ vehicles_removed: 1, exports_written: 1 });
  });

  it('새 실행을 시작하면 이전 실행을 닫고 통계를 초기화해야 함', () => {
    const logger = new RunLogger({ logsDir, enabled: false });

    const first = logger.startRun(null);
    logger.log({ event: 'drone_created', drone_id: 'drone1', pattern: 'SQUARE', sample_count: 5 });
    const second = logger.startRun(null);

    expect(second).not.toBe(first);
    expect(logger.getRunId()).toBe(second);
    expect(logger.getStats().drones_created).toBe(0);
  });

  it('getLogger 는 싱글톤이고 resetLogger 후 새 인스턴스를 반환해야 함', () => {
    const first = getLogger({ logsDir, enabled: false });
    expect(getLogger()).toBe(first);

    resetLogger();
    expect(getLogger({ logsDir, enabled: false })).not.toBe(first);
  });
});
