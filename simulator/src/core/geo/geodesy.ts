/**
 * 측지 계산 기본 함수
 *
 * 지구를 반지름 6,371,000m 구로 보는 근사. 고도 항 없음.
 */

import { GeoPoint } from '../../../../shared/schemas';

/** 지구 반지름 (m) */
export const EARTH_RADIUS = 6371000;

export function toRadians(degrees: number): number {
  return degrees * (Math.PI / 180);
}

export function toDegrees(radians: number): number {
  return radians * (180 / Math.PI);
}

/**
 * 두 지점 간 대원 거리 (haversine, m)
 */
export function distance(p1: GeoPoint, p2: GeoPoint): number {
  const dLat = toRadians(p2.lat - p1.lat);
  const dLon = toRadians(p2.lon - p1.lon);
  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(p1.lat)) * Math.cos(toRadians(p2.lat)) * Math.sin(dLon / 2) ** 2;
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
  return EARTH_RADIUS * c;
}

/**
 * p1 → p2 초기 방위 (라디안, 북쪽 기준 시계 방향)
 *
 * p1 === p2 이면 의미 없는 값(0)이 나오므로 호출 측에서 걸러야 함
 */
export function bearing(p1: GeoPoint, p2: GeoPoint): number {
  const lat1 = toRadians(p1.lat);
  const lat2 = toRadians(p2.lat);
  const dLon = toRadians(p2.lon - p1.lon);

  const x = Math.sin(dLon) * Math.cos(lat2);
  const y = Math.cos(lat1) * Math.sin(lat2) - Math.sin(lat1) * Math.cos(lat2) * Math.cos(dLon);
  return Math.atan2(x, y);
}

/**
 * 미터 → 도 (소각 근사, 위도별 경도 축척 보정 없음)
 */
export function metersToDegrees(meters: number): number {
  return meters / EARTH_RADIUS * (180 / Math.PI);
}

/**
 * 도 → 미터
 */
export function degreesToMeters(degrees: number): number {
  return degrees * EARTH_RADIUS * (Math.PI / 180);
}

/**
 * 한 스텝 이동 거리 제한
 *
 * start → proposedEnd 거리가 maxDistance 를 넘으면 위경도 공간에서
 * 선형 보간한 지점을 반환 (국지적으로만 정확)
 */
export function clampStep(start: GeoPoint, proposedEnd: GeoPoint, maxDistance: number): GeoPoint {
  const d = distance(start, proposedEnd);
  if (d > maxDistance) {
    const ratio = maxDistance / d;
    return {
      lat: start.lat + (proposedEnd.lat - start.lat) * ratio,
      lon: start.lon + (proposedEnd.lon - start.lon) * ratio,
    };
  }
  return proposedEnd;
}

/**
 * 방위(도)를 [0, 360) 범위로 정규화
 */
export function normalizeDegrees(degrees: number): number {
  const wrapped = degrees % 360;
  return wrapped < 0 ? wrapped + 360 : wrapped + 0;
}

export function samePoint(p1: GeoPoint, p2: GeoPoint): boolean {
  return p1.lat === p2.lat && p1.lon === p2.lon;
}
