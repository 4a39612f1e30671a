/**
 * 범용 패턴 스테퍼
 *
 * (거리, 방위) 구간 목록을 순환하며 틱마다 고정 보폭으로 전진.
 * 모서리에서 남는 보폭은 다음 구간으로 이월되어 틱당 이동량이 보존됨.
 */

import { GeoPoint } from '../../../../shared/schemas';
import { invalidParameter } from '../errors/errorHandler';
import { metersToDegrees, toRadians } from '../geo/geodesy';

/** 패턴 빌더 출력: 시작점 + 구간 목록 */
export interface PatternPlan {
  startPoint: GeoPoint;
  distances: number[];   // m
  bearings: number[];    // 도
}

/** 속도가 확정된 패턴 파라미터 */
export type WithSpeed<T> = T & { maxSpeed: number };

/** 틱 하나의 생성 결과 */
export interface PatternSample {
  lat: number;
  lon: number;
  speed: number;         // m/s
}

/** 속도는 소수 둘째 자리까지 */
export function roundSpeed(speed: number): number {
  return Math.round(speed * 100) / 100;
}

/**
 * 구간 목록 검증
 */
export function validatePlan(plan: PatternPlan): void {
  const { startPoint, distances, bearings } = plan;

  if (!Number.isFinite(startPoint.lat) || !Number.isFinite(startPoint.lon)) {
    throw invalidParameter('start point must be finite');
  }
  if (distances.length === 0) {
    throw invalidParameter('segment list is empty');
  }
  if (distances.length !== bearings.length) {
    throw invalidParameter(`distances (${distances.length}) and bearings (${bearings.length}) differ in length`);
  }
  distances.forEach((d, i) => {
    if (!Number.isFinite(d) || d <= 0) {
      throw invalidParameter(`segment ${i} length must be > 0 (got ${d})`);
    }
  });
  bearings.forEach((b, i) => {
    if (!Number.isFinite(b)) {
      throw invalidParameter(`segment ${i} bearing must be finite`);
    }
  });
}

export function validateSpeed(maxSpeed: number): void {
  if (!Number.isFinite(maxSpeed) || maxSpeed <= 0) {
    throw invalidParameter(`max speed must be > 0 (got ${maxSpeed})`);
  }
}

export function validateSampleCount(sampleCount: number): void {
  if (!Number.isInteger(sampleCount) || sampleCount < 0) {
    throw invalidParameter(`sample count must be a non-negative integer (got ${sampleCount})`);
  }
}

/**
 * 구간 목록을 따라 sampleCount 개의 샘플 생성
 *
 * - 첫 샘플은 시작점, 속도 0
 * - 첫 구간은 목표 길이를 √2 로 나눈 값 사용 (도형이 모서리에서 대각선만큼 떨어져 시작)
 * - 구간 목록은 필요한 만큼 순환 재생
 */
export function generatePattern(plan: PatternPlan, sampleCount: number, maxSpeed: number): PatternSample[] {
  validatePlan(plan);
  validateSpeed(maxSpeed);
  validateSampleCount(sampleCount);

  const { distances, bearings } = plan;
  const samples: PatternSample[] = [];
  if (sampleCount === 0) return samples;

  let lat = plan.startPoint.lat;
  let lon = plan.startPoint.lon;
  samples.push({ lat, lon, speed: 0 });

  const stepDegrees = metersToDegrees(maxSpeed);
  const segmentCount = distances.length;

  // 상태: 현재 구간, 구간 목표 길이(도), 구간 내 진행량(도)
  let turn = 0;
  let segmentLength = metersToDegrees(distances[0]) / Math.SQRT2;
  let covered = 0;

  const advance = (amount: number): void => {
    const rad = toRadians(bearings[turn]);
    lat += amount * Math.cos(rad);
    lon += amount * Math.sin(rad);
  };

  while (samples.length < sampleCount) {
    let budget = stepDegrees;

    for (;;) {
      const remaining = segmentLength - covered;
      if (budget <= remaining) {
        advance(budget);
        covered += budget;
        break;
      }
      // 경계까지 이동 후 남은 보폭을 다음 구간으로 이월 (remaining === 0 이면 회전만)
      if (remaining > 0) {
        advance(remaining);
        budget -= remaining;
      }
      turn = (turn + 1) % segmentCount;
      segmentLength = metersToDegrees(distances[turn]);
      covered = 0;
    }

    samples.push({ lat, lon, speed: maxSpeed });
  }

  return samples;
}

/**
 * 정지 패턴: 모든 틱에서 같은 지점, 속도 0
 */
export function generateStatic(point: GeoPoint, sampleCount: number): PatternSample[] {
  if (!Number.isFinite(point.lat) || !Number.isFinite(point.lon)) {
    throw invalidParameter('point must be finite');
  }
  validateSampleCount(sampleCount);

  const samples: PatternSample[] = [];
  for (let i = 0; i < sampleCount; i++) {
    samples.push({ lat: point.lat, lon: point.lon, speed: 0 });
  }
  return samples;
}
