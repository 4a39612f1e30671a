/**
 * 차량 추종 패턴
 *
 * 관측된 차량 궤적에서 진행 방위를 구하고, 차량 뒤쪽 offset 지점을
 * 목표로 지수 평활 + 최대 속도 제한을 적용해 드론 위치를 만든다.
 */

import { GeoPoint, DEFAULT_PATTERN_CONFIG } from '../../../../shared/schemas';
import { invalidParameter } from '../errors/errorHandler';
import { bearing, clampStep, distance, metersToDegrees, samePoint, toRadians } from '../geo/geodesy';
import { PatternSample, roundSpeed, validateSpeed } from './stepper';

export interface FollowingOptions {
  offsetDistance: number;
  maxSpeed: number;
  smoothingFactor?: number;
}

/**
 * i 시점 차량 진행 방위 (라디안)
 *
 * (i, i+1) 우선, 없으면 (i-1, i). 두 점이 같거나 없으면 null.
 */
export function headingAt(track: ReadonlyArray<GeoPoint | null>, i: number): number | null {
  const current = track[i];
  if (!current) return null;

  const next = i < track.length - 1 ? track[i + 1] : null;
  if (next && !samePoint(current, next)) {
    return bearing(current, next);
  }

  const previous = i > 0 ? track[i - 1] : null;
  if (previous && !samePoint(previous, current)) {
    return bearing(previous, current);
  }

  return null;
}

/**
 * 추종 드론 좌표 생성
 *
 * - 입력의 null(차량 부재)은 출력에서도 null
 * - 첫 관측 시점에는 차량 위치 그대로, 속도 0
 * - 속도 = 제한된 이동 거리 / 직전 출력 이후 경과 틱 수
 */
export function generateFollowingCoordinates(
  track: ReadonlyArray<GeoPoint | null>,
  options: FollowingOptions
): Array<PatternSample | null> {
  const { offsetDistance, maxSpeed } = options;
  const smoothingFactor = options.smoothingFactor ?? DEFAULT_PATTERN_CONFIG.following_smoothing_factor;

  if (!Number.isFinite(offsetDistance) || offsetDistance < 0) {
    throw invalidParameter(`offset distance must be >= 0 (got ${offsetDistance})`);
  }
  validateSpeed(maxSpeed);
  if (!(smoothingFactor > 0 && smoothingFactor <= 1)) {
    throw invalidParameter(`smoothing factor must be in (0, 1] (got ${smoothingFactor})`);
  }

  const offsetDegrees = metersToDegrees(offsetDistance);
  const output: Array<PatternSample | null> = [];
  let previous: { point: GeoPoint; tick: number } | null = null;
  let lastHeading: number | null = null;

  for (let tick = 0; tick < track.length; tick++) {
    const position = track[tick];
    if (!position) {
      output.push(null);
      continue;
    }

    if (!previous) {
      output.push({ lat: position.lat, lon: position.lon, speed: 0 });
      previous = { point: position, tick };
      continue;
    }

    const heading: number | null = headingAt(track, tick) ?? lastHeading;
    if (heading === null) {
      // 방위를 아직 알 수 없음: 제자리 유지
      output.push({ lat: previous.point.lat, lon: previous.point.lon, speed: 0 });
      previous = { point: previous.point, tick };
      continue;
    }
    lastHeading = heading;

    // 차량 뒤쪽 offset 지점 (경도만 cos(위도) 보정)
    const target: GeoPoint = {
      lat: position.lat - offsetDegrees * Math.cos(heading),
      lon: position.lon - (offsetDegrees / Math.cos(toRadians(position.lat))) * Math.sin(heading),
    };

    const from = previous.point;
    const smoothed: GeoPoint = {
      lat: from.lat + smoothingFactor * (target.lat - from.lat),
      lon: from.lon + smoothingFactor * (target.lon - from.lon),
    };
    const limited = clampStep(from, smoothed, maxSpeed);
    const speed = roundSpeed(distance(from, limited) / (tick - previous.tick));

    output.push({ lat: limited.lat, lon: limited.lon, speed });
    previous = { point: limited, tick };
  }

  return output;
}
