/**
 * 공통 데이터 스키마 정의
 *
 * 궤적 합성 엔진 ↔ 실행 파일 ↔ 트레이스 입출력 간 공유 타입
 */

// ============================================
// 기본 타입
// ============================================

/** 위경도 좌표 (십진 도) */
export interface GeoPoint {
  lat: number;
  lon: number;
}

/** 드론 이동 패턴 */
export type PatternKind =
  | 'CIRCULAR'   // 원형 선회
  | 'ANGULAR'    // 지그재그
  | 'TRACTOR'    // 트랙터(잔디깎기) 왕복
  | 'SQUARE'     // 정사각형 순회
  | 'FOLLOWING'  // 지상 차량 추종
  | 'STATIC'     // 정지 호버링
  | 'GENERIC';   // 임의 구간 목록

/** 트랙터 패턴 방향 */
export type TractorOrientation = 'horizontal' | 'vertical';

/** 생성 드론의 카테고리 (트레이스 type 속성 값) */
export const DRONE_CATEGORY = 'UAV';

/** 드론 카테고리의 기본 범례 */
export const DRONE_CATEGORY_LABEL = 'UAV';

/**
 * 차량 카테고리: 드론 카테고리 또는 트레이스에서 읽은 type 값.
 * 범례(표시 이름)는 Simulation 의 별도 맵이 가짐
 */
export type VehicleCategory = typeof DRONE_CATEGORY | (string & {});

// ============================================
// 트레이스 레코드
// ============================================

/**
 * 트레이스의 vehicle 레코드 한 줄
 * x = 경도, y = 위도
 */
export interface TraceVehicleRecord {
  id: string;
  x: number;
  y: number;
  angle: number;
  type: VehicleCategory;
  speed: number;
  pos: number;
  lane: string;
  slope: number;
}

/** 트레이스의 timestep 하나 */
export interface TraceTimestep {
  time: number;              // 원본 time 속성 (초)
  vehicles: TraceVehicleRecord[];
}

// ============================================
// 패턴 파라미터
// ============================================

export interface CircularPatternParams {
  center: GeoPoint;
  radiusMeters: number;
  maxSpeed?: number;         // 생략 시 설정 기본값
  startAngle?: number;       // 초기 진행 방위 (도)
}

export interface AngularPatternParams {
  startPoint: GeoPoint;
  maxLength: number;         // 구간 길이 (m)
  startAngle?: number;
  maxTurns?: number;
  angleAlpha?: number;        // 지그재그 벌어짐 각 (도)
  maxSpeed?: number;         // 생략 시 설정 기본값
}

export interface TractorPatternParams {
  startPoint: GeoPoint;
  widthBetweenTracks: number;  // 트랙 간격 (m)
  maxLength: number;           // 트랙 길이 (m)
  maxTurns: number;
  orientation?: TractorOrientation;
  maxSpeed?: number;         // 생략 시 설정 기본값
}

export interface SquarePatternParams {
  centerPoint: GeoPoint;
  sideLength: number;
  angleDegrees?: number;
  maxSpeed?: number;         // 생략 시 설정 기본값
}

export interface FollowingPatternParams {
  vehicleId: string;
  offsetDistance?: number;   // 차량과의 간격 (m)
  maxSpeed?: number;         // 생략 시 설정 기본값
  smoothingFactor?: number;
}

export interface GenericPatternParams {
  startPoint: GeoPoint;
  distances: number[];       // 구간 길이 (m)
  bearings: number[];        // 구간 방위 (도)
  maxSpeed?: number;         // 생략 시 설정 기본값
}

// ============================================
// 기본값
// ============================================

export const DEFAULT_PATTERN_CONFIG = {
  max_speed: 10,               // m/s
  circular_start_angle: 0,
  angular_start_angle: 0,
  angular_max_turns: 3,
  angular_angle_alpha: 30,
  tractor_orientation: 'horizontal',
  square_angle_degrees: 90,
  following_offset_distance: 10,
  following_smoothing_factor: 0.4,
} as const;

// ============================================
// 실행 파일 (run file)
// ============================================

/** 실행 파일 그룹 이름 접두사 (그룹 키 = 접두사 + 임의 접미사) */
export const RUN_GROUP_PREFIXES = [
  'DroneCircular',
  'DroneAngular',
  'DroneTractor',
  'DroneStatic',
  'DroneSquare',
  'DroneFollowing',
  'DroneGeneric',
  'ExportXML',
  'ChangeLegend',
  'PrintVehicleInfo',
  'RemoveVehicle',
] as const;

export type RunGroupKind = 'Simulation' | (typeof RUN_GROUP_PREFIXES)[number];
