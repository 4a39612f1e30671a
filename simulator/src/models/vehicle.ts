/**
 * 차량(에이전트) 데이터 모델
 *
 * 틱 → 샘플 희소 시계열. 수집된 지상 차량과 생성 드론이 같은 모델을 사용.
 */

import { GeoPoint, TraceVehicleRecord, VehicleCategory } from '../../../shared/schemas';
import { PatternSample, roundSpeed } from '../core/patterns/stepper';

/** 한 틱의 상태 (불변) */
export interface Timestep {
  readonly time: number;      // 정수 틱
  readonly lat: number;
  readonly lon: number;
  readonly angle: number;     // 진행 방위 (도)
  readonly speed: number;     // m/s
  readonly pos: number;       // 트레이스 통과 필드
  readonly lane: string;      // 트레이스 통과 필드
  readonly slope: number;     // 트레이스 통과 필드
}

/** 생성 드론의 통과 필드 기본값 */
const DRONE_PASSTHROUGH = {
  angle: 0,
  pos: 0,
  lane: '0',
  slope: 0,
} as const;

export class Vehicle {
  readonly id: string;
  readonly type: VehicleCategory;
  private timesteps: Map<number, Timestep> = new Map();

  constructor(id: string, type: VehicleCategory) {
    this.id = id;
    this.type = type;
  }

  /**
   * 샘플 추가 (같은 틱은 덮어씀)
   */
  addTimestep(timestep: Timestep): void {
    this.timesteps.set(timestep.time, Object.freeze({ ...timestep }));
  }

  /**
   * 생성 패턴 샘플 추가 (통과 필드는 "0", 속도는 소수 둘째 자리 반올림)
   */
  addGeneratedSample(time: number, sample: PatternSample): void {
    this.addTimestep({
      time,
      lat: sample.lat,
      lon: sample.lon,
      speed: roundSpeed(sample.speed),
      ...DRONE_PASSTHROUGH,
    });
  }

  getTimestep(time: number): Timestep | null {
    return this.timesteps.get(time) ?? null;
  }

  isPresent(time: number): boolean {
    return this.timesteps.has(time);
  }

  getPosition(time: number): GeoPoint | null {
    const timestep = this.timesteps.get(time);
    return timestep ? { lat: timestep.lat, lon: timestep.lon } : null;
  }

  /**
   * 트레이스 레코드 형태로 변환 (x = 경도, y = 위도)
   */
  getTimestepRecord(time: number): TraceVehicleRecord | null {
    const timestep = this.timesteps.get(time);
    if (!timestep) return null;

    return {
      id: this.id,
      x: timestep.lon,
      y: timestep.lat,
      angle: timestep.angle,
      type: this.type,
      speed: timestep.speed,
      pos: timestep.pos,
      lane: timestep.lane,
      slope: timestep.slope,
    };
  }

  /**
   * 존재하는 틱 목록 (오름차순)
   */
  getTicks(): number[] {
    return Array.from(this.timesteps.keys()).sort((a, b) => a - b);
  }

  get sampleCount(): number {
    return this.timesteps.size;
  }
}
