/**
 * 패턴 빌더
 *
 * 도형 파라미터 → (시작점, 거리 목록, 방위 목록)
 * 생성은 stepper 에 위임
 */

import {
  GeoPoint,
  CircularPatternParams,
  AngularPatternParams,
  TractorPatternParams,
  SquarePatternParams,
  GenericPatternParams,
  DEFAULT_PATTERN_CONFIG,
} from '../../../../shared/schemas';
import { invalidParameter } from '../errors/errorHandler';
import { metersToDegrees, normalizeDegrees, toDegrees, toRadians } from '../geo/geodesy';
import { PatternPlan, WithSpeed, validatePlan, validateSpeed } from './stepper';

function requirePositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw invalidParameter(`${name} must be > 0 (got ${value})`);
  }
}

function requireTurns(maxTurns: number): void {
  if (!Number.isInteger(maxTurns) || maxTurns < 1) {
    throw invalidParameter(`max turns must be an integer >= 1 (got ${maxTurns})`);
  }
}

function requireFiniteAngle(name: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw invalidParameter(`${name} must be finite`);
  }
}

/**
 * 원형 패턴
 *
 * ω = maxSpeed / radius (틱 = 1초), 한 바퀴 N = floor(2π/ω) 스텝.
 * 구간은 원에 내접하는 정N각형의 변: 방위 증분 Δ = 2π/N, 길이 2r·sin(Δ/2).
 * 한 바퀴 방위 합이 정확히 360° 라 다각형이 닫히고, 여러 바퀴를 돌아도 원에서 벗어나지 않음.
 *
 * stepper 는 첫 구간을 √2 로 줄여 걷기 때문에 시작점은 첫 변 위,
 * 두 번째 꼭짓점에서 (변 길이 / √2) 만큼 앞선 지점.
 */
export function buildCircularPlan(params: WithSpeed<CircularPatternParams>): PatternPlan {
  const { center, radiusMeters, maxSpeed } = params;
  const startAngle = params.startAngle ?? DEFAULT_PATTERN_CONFIG.circular_start_angle;

  requirePositive('radius', radiusMeters);
  validateSpeed(maxSpeed);
  requireFiniteAngle('start angle', startAngle);

  const omega = maxSpeed / radiusMeters;  // rad/s
  const stepsPerCircle = Math.floor((2 * Math.PI) / omega);
  if (stepsPerCircle < 1) {
    throw invalidParameter(`radius ${radiusMeters}m is too small for speed ${maxSpeed}m/s`);
  }

  const delta = (2 * Math.PI) / stepsPerCircle;
  const chordMeters = 2 * radiusMeters * Math.sin(delta / 2);

  // 시계 방향 선회: 중심에서 본 첫 꼭짓점 방위 = 첫 변 방위 - 90° - Δ/2
  const phase = toRadians(startAngle - 90) - delta / 2;
  const radiusDegrees = metersToDegrees(radiusMeters);
  const firstVertex: GeoPoint = {
    lat: center.lat + radiusDegrees * Math.cos(phase),
    lon: center.lon + radiusDegrees * Math.sin(phase),
  };

  const lead = metersToDegrees(chordMeters) * (1 - 1 / Math.SQRT2);
  const heading = toRadians(startAngle);
  const startPoint: GeoPoint = {
    lat: firstVertex.lat + lead * Math.cos(heading),
    lon: firstVertex.lon + lead * Math.sin(heading),
  };

  const distances: number[] = [];
  const bearings: number[] = [];
  for (let i = 0; i < stepsPerCircle; i++) {
    bearings.push(startAngle + toDegrees(delta * i));
    distances.push(chordMeters);
  }

  return { startPoint, distances, bearings };
}

/**
 * 지그재그 패턴
 *
 * (start+α, 180-start-α) 쌍 maxTurns 회 → 거울상 (start-α, 180+start+α) 쌍 maxTurns 회
 */
export function buildAngularPlan(params: WithSpeed<AngularPatternParams>): PatternPlan {
  const { startPoint, maxLength, maxSpeed } = params;
  const startAngle = params.startAngle ?? DEFAULT_PATTERN_CONFIG.angular_start_angle;
  const maxTurns = params.maxTurns ?? DEFAULT_PATTERN_CONFIG.angular_max_turns;
  const angleAlpha = params.angleAlpha ?? DEFAULT_PATTERN_CONFIG.angular_angle_alpha;

  requirePositive('max length', maxLength);
  requireTurns(maxTurns);
  validateSpeed(maxSpeed);
  requireFiniteAngle('start angle', startAngle);
  requireFiniteAngle('angle alpha', angleAlpha);

  const distances: number[] = [];
  const bearings: number[] = [];

  for (let turn = 0; turn < maxTurns; turn++) {
    bearings.push(startAngle + angleAlpha, 180 - startAngle - angleAlpha);
    distances.push(maxLength, maxLength);
  }
  for (let turn = 0; turn < maxTurns; turn++) {
    bearings.push(startAngle - angleAlpha, 180 + startAngle + angleAlpha);
    distances.push(maxLength, maxLength);
  }

  return { startPoint, distances, bearings };
}

/**
 * 트랙터(잔디깎기) 패턴
 *
 * 기준 방위(가로 0° / 세로 90°)로 트랙 간격만큼 이동하며
 * 긴 트랙을 번갈아 왕복, 끝에서 한 칸 옮겨 반대 방향으로 되돌아옴
 */
export function buildTractorPlan(params: WithSpeed<TractorPatternParams>): PatternPlan {
  const { startPoint, widthBetweenTracks, maxLength, maxTurns, maxSpeed } = params;
  const orientation = params.orientation ?? DEFAULT_PATTERN_CONFIG.tractor_orientation;

  requirePositive('width between tracks', widthBetweenTracks);
  requirePositive('max length', maxLength);
  requireTurns(maxTurns);
  validateSpeed(maxSpeed);

  const base = orientation === 'horizontal' ? 0 : 90;
  const distances: number[] = [widthBetweenTracks];
  const bearings: number[] = [base];

  // 진행
  for (let turn = 0; turn < maxTurns; turn++) {
    bearings.push(turn % 2 === 0 ? 90 - base : 270 - base);
    distances.push(maxLength);
    bearings.push(base);
    distances.push(widthBetweenTracks);
  }

  // 반환 홉
  bearings.push(180 + base);
  distances.push(widthBetweenTracks);

  // 복귀
  for (let turn = 0; turn < maxTurns; turn++) {
    bearings.push(turn % 2 === 0 ? 270 - base : 90 - base);
    distances.push(maxLength);
    bearings.push(180 + base);
    distances.push(widthBetweenTracks);
  }

  return { startPoint, distances, bearings };
}

/**
 * 정사각형 패턴
 *
 * 방위 angle - 90·i (i = 0..3), 시작점은 중심에서 대각선 절반만큼 역산.
 * centerDirection = -3·angle + 315 는 angle 이 90° 배수일 때 중심을 맞춤.
 */
export function buildSquarePlan(params: WithSpeed<SquarePatternParams>): PatternPlan {
  const { centerPoint, sideLength, maxSpeed } = params;
  const angleDegrees = params.angleDegrees ?? DEFAULT_PATTERN_CONFIG.square_angle_degrees;

  requirePositive('side length', sideLength);
  validateSpeed(maxSpeed);
  requireFiniteAngle('angle', angleDegrees);

  const distances: number[] = [];
  const bearings: number[] = [];
  for (let i = 0; i < 4; i++) {
    distances.push(sideLength);
    bearings.push(normalizeDegrees(angleDegrees - 90 * i));
  }

  const centerDirection = toRadians(normalizeDegrees(-3 * angleDegrees + 315));
  const halfDiagonal = metersToDegrees((Math.SQRT2 * sideLength) / 2);
  const startPoint: GeoPoint = {
    lat: centerPoint.lat - halfDiagonal * Math.cos(centerDirection),
    lon: centerPoint.lon - halfDiagonal * Math.sin(centerDirection),
  };

  return { startPoint, distances, bearings };
}

/**
 * 임의 구간 목록 (검증만 수행)
 */
export function buildGenericPlan(params: WithSpeed<GenericPatternParams>): PatternPlan {
  validateSpeed(params.maxSpeed);
  const plan: PatternPlan = {
    startPoint: params.startPoint,
    distances: [...params.distances],
    bearings: [...params.bearings],
  };
  validatePlan(plan);
  return plan;
}
