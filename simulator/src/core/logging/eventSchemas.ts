/**
 * 실행 로그 이벤트 스키마 정의
 *
 * JSONL 형식으로 1줄 1이벤트 저장됩니다.
 */

import { PatternKind } from '../../../../shared/schemas';

// ============================================
// 기본 이벤트 인터페이스
// ============================================

export interface BaseEvent {
  timestamp: number;  // 실행 시작 후 경과 시간 (ms)
  event: string;      // 이벤트 타입
}

// ============================================
// 실행 이벤트
// ============================================

export interface RunStartEvent extends BaseEvent {
  event: 'run_start';
  run_id: string;
  run_file: string | null;
}

export interface RunSummary {
  drones_created: number;
  drones_by_pattern: Partial<Record<PatternKind, number>>;
  vehicles_removed: number;
  exports_written: number;
  groups_skipped: number;
}

export interface RunEndEvent extends BaseEvent {
  event: 'run_end';
  run_id: string;
  duration_ms: number;
  summary: RunSummary;
}

export interface GroupSkippedEvent extends BaseEvent {
  event: 'group_skipped';
  group: string;
}

// ============================================
// 시뮬레이션 이벤트
// ============================================

export interface TraceLoadedEvent extends BaseEvent {
  event: 'trace_loaded';
  trace_path: string | null;
  vehicle_count: number;
  timestep_count: number;
  tick_count: number;
  categories: string[];
}

export interface DroneCreatedEvent extends BaseEvent {
  event: 'drone_created';
  drone_id: string;
  pattern: PatternKind;
  sample_count: number;
  max_speed?: number;
  followed_id?: string;
}

export interface VehicleRemovedEvent extends BaseEvent {
  event: 'vehicle_removed';
  vehicle_id: string;
}

export interface LegendChangedEvent extends BaseEvent {
  event: 'legend_changed';
  category: string;
  old_label: string;
  new_label: string;
}

export interface TraceExportedEvent extends BaseEvent {
  event: 'trace_exported';
  output_path: string;
  geo: boolean;
  vehicle_count: number;
}

// ============================================
// 유니온 타입
// ============================================

export type LogEvent =
  | RunStartEvent
  | RunEndEvent
  | GroupSkippedEvent
  | TraceLoadedEvent
  | DroneCreatedEvent
  | VehicleRemovedEvent
  | LegendChangedEvent
  | TraceExportedEvent;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** timestamp 는 로거가 채움 */
export type LogEventInput = DistributiveOmit<LogEvent, 'timestamp'>;
