/**
 * JSONL 실행 로거
 *
 * 실행 중 발생한 이벤트를 JSONL 형식으로 파일에 저장합니다.
 * 파일명: {logsDir}/{run_id}_{timestamp}.jsonl
 */

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { LogEvent, LogEventInput, RunSummary } from './eventSchemas';

export interface LoggerConfig {
  logsDir: string;
  enabled: boolean;
  consoleOutput: boolean;   // 콘솔에도 출력할지 여부
  customFilename?: string;  // 커스텀 파일명 (선택사항)
}

const DEFAULT_CONFIG: LoggerConfig = {
  logsDir: './logs',
  enabled: true,
  consoleOutput: false,
  customFilename: undefined,
};

function emptySummary(): RunSummary {
  return {
    drones_created: 0,
    drones_by_pattern: {},
    vehicles_removed: 0,
    exports_written: 0,
    groups_skipped: 0,
  };
}

export function createRunId(): string {
  return `RUN-${uuidv4().substring(0, 8).toUpperCase()}`;
}

export class RunLogger {
  private config: LoggerConfig;
  private currentFile: string | null = null;
  private fd: number | null = null;
  private runId: string | null = null;
  private sessionStartTime: number = Date.now();
  private eventCount: number = 0;
  private stats: RunSummary = emptySummary();

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * 로그 디렉토리 확인/생성
   */
  private ensureLogsDir(): void {
    if (!fs.existsSync(this.config.logsDir)) {
      fs.mkdirSync(this.config.logsDir, { recursive: true });
    }
  }

  /**
   * 새 실행 시작
   */
  startRun(runFile: string | null, runId: string = createRunId()): string {
    // 이전 실행 종료
    if (this.runId) {
      this.endRun();
    }

    this.runId = runId;
    this.sessionStartTime = Date.now();
    this.eventCount = 0;
    this.stats = emptySummary();

    if (this.config.enabled) {
      this.ensureLogsDir();
      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      const filename = this.config.customFilename ?? `${runId}_${timestamp}.jsonl`;
      this.currentFile = path.join(this.config.logsDir, filename);
      this.fd = fs.openSync(this.currentFile, 'a');
      console.log(`[Logger] 로그 파일 생성: ${this.currentFile}`);
    }

    this.log({ event: 'run_start', run_id: runId, run_file: runFile });
    return runId;
  }

  /**
   * 실행 종료
   */
  endRun(): void {
    if (!this.runId) return;

    this.log({
      event: 'run_end',
      run_id: this.runId,
      duration_ms: Date.now() - this.sessionStartTime,
      summary: this.getStats(),
    });

    if (this.fd !== null) {
      fs.closeSync(this.fd);
      this.fd = null;
      console.log(`[Logger] 로그 저장 완료: ${this.eventCount}개 이벤트, ${this.currentFile}`);
    }

    this.runId = null;
  }

  /**
   * 이벤트 로깅
   */
  log(input: LogEventInput): void {
    const event: LogEvent = { ...input, timestamp: Date.now() - this.sessionStartTime };

    // 통계는 파일 기록 여부와 무관하게 유지
    this.updateStats(event);

    if (!this.config.enabled) return;

    const line = JSON.stringify(event) + '\n';

    if (this.fd !== null) {
      fs.writeSync(this.fd, line);
      this.eventCount++;
    }

    if (this.config.consoleOutput) {
      console.log(`[Log] ${event.event}:`, line.substring(0, 100));
    }
  }

  /**
   * 통계 업데이트
   */
  private updateStats(event: LogEvent): void {
    switch (event.event) {
      case 'drone_created':
        this.stats.drones_created++;
        this.stats.drones_by_pattern[event.pattern] = (this.stats.drones_by_pattern[event.pattern] ?? 0) + 1;
        break;
      case 'vehicle_removed':
        this.stats.vehicles_removed++;
        break;
      case 'trace_exported':
        this.stats.exports_written++;
        break;
      case 'group_skipped':
        this.stats.groups_skipped++;
        break;
    }
  }

  /**
   * 현재 통계 반환
   */
  getStats(): RunSummary {
    return { ...this.stats, drones_by_pattern: { ...this.stats.drones_by_pattern } };
  }

  getRunId(): string | null {
    return this.runId;
  }

  /**
   * 현재 로그 파일 경로 반환
   */
  getCurrentLogFile(): string | null {
    return this.currentFile;
  }
}

// 싱글톤 인스턴스
let loggerInstance: RunLogger | null = null;

export function getLogger(config?: Partial<LoggerConfig>): RunLogger {
  if (!loggerInstance) {
    loggerInstance = new RunLogger(config);
  }
  return loggerInstance;
}

export function resetLogger(): void {
  if (loggerInstance) {
    loggerInstance.endRun();
  }
  loggerInstance = null;
}
