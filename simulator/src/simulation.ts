/**
 * 시뮬레이션 (차량 레지스트리)
 *
 * 지상 차량 트레이스를 읽어 레지스트리를 구성하고,
 * 패턴별 드론을 생성해 추가한 뒤 같은 형식으로 다시 내보냄.
 */

import {
  GeoPoint,
  PatternKind,
  TraceVehicleRecord,
  CircularPatternParams,
  AngularPatternParams,
  TractorPatternParams,
  SquarePatternParams,
  FollowingPatternParams,
  GenericPatternParams,
  DRONE_CATEGORY,
  DRONE_CATEGORY_LABEL,
  VehicleCategory,
  DEFAULT_PATTERN_CONFIG,
} from '../../shared/schemas';
import { Vehicle } from './models/vehicle';
import { LoadedTrace, readTraceFile, timeToTick } from './core/trace/traceReader';
import { renderTrace, writeTraceFile } from './core/trace/traceWriter';
import {
  buildCircularPlan,
  buildAngularPlan,
  buildTractorPlan,
  buildSquarePlan,
  buildGenericPlan,
} from './core/patterns/builders';
import { generatePattern, generateStatic, PatternPlan, PatternSample } from './core/patterns/stepper';
import { generateFollowingCoordinates } from './core/patterns/following';
import { ErrorCode, SynthesisError, notFound } from './core/errors/errorHandler';
import { RunLogger } from './core/logging/logger';

/** 렌더러 경계에서만 쓰는 "부재" 좌표 */
export const ABSENT_POSITION: Readonly<GeoPoint> = Object.freeze({ lat: 0, lon: 0 });

export interface SimulationOptions {
  logger?: RunLogger;
  defaultMaxSpeed?: number;
  smoothingFactor?: number;
}

/** 카테고리별 좌표 묶음 (렌더러 입력) */
export interface CategoryCoordinates {
  category: VehicleCategory;
  label: string;
  tracks: GeoPoint[][];   // 차량별, 틱별 좌표 (부재 = ABSENT_POSITION)
}

export class Simulation {
  private vehicles: Map<string, Vehicle> = new Map();
  private categoryLabels: Map<VehicleCategory, string> = new Map();
  private droneCounter: number = 0;
  private logger: RunLogger | null;
  private defaultMaxSpeed: number;
  private smoothingFactor: number;

  readonly tracePath: string | null;
  private readonly sourceXml: string;

  /** 수집된 트레이스의 마지막 틱 (+1 오프셋 적용 후) */
  readonly lastIngestedTick: number;

  /** 생성 패턴 길이 = 틱 수 (조회는 이 값까지 포함) */
  readonly maxTickExclusive: number;

  constructor(trace: LoadedTrace, options: SimulationOptions = {}) {
    this.tracePath = trace.path;
    this.sourceXml = trace.xml;
    this.logger = options.logger ?? null;
    this.defaultMaxSpeed = options.defaultMaxSpeed ?? DEFAULT_PATTERN_CONFIG.max_speed;
    this.smoothingFactor = options.smoothingFactor ?? DEFAULT_PATTERN_CONFIG.following_smoothing_factor;

    this.categoryLabels.set(DRONE_CATEGORY, DRONE_CATEGORY_LABEL);

    let lastTick = 0;
    for (const timestep of trace.timesteps) {
      const tick = timeToTick(timestep.time);
      lastTick = Math.max(lastTick, tick);

      for (const record of timestep.vehicles) {
        let vehicle = this.vehicles.get(record.id);
        if (!vehicle) {
          vehicle = new Vehicle(record.id, record.type);
          this.vehicles.set(record.id, vehicle);
          if (!this.categoryLabels.has(record.type)) {
            this.categoryLabels.set(record.type, record.type);
          }
        }
        vehicle.addTimestep({
          time: tick,
          lat: record.y,
          lon: record.x,
          angle: record.angle,
          speed: record.speed,
          pos: record.pos,
          lane: record.lane,
          slope: record.slope,
        });
      }
    }

    this.lastIngestedTick = lastTick;
    this.maxTickExclusive = lastTick + 1;

    this.logger?.log({
      event: 'trace_loaded',
      trace_path: this.tracePath,
      vehicle_count: this.vehicles.size,
      timestep_count: trace.timesteps.length,
      tick_count: this.tickCount,
      categories: Array.from(this.categoryLabels.keys()),
    });
    console.log(`[Simulation] 차량 ${this.vehicles.size}대, 틱 ${this.tickCount}개 로드`);
  }

  /**
   * 트레이스 파일에서 시뮬레이션 생성
   */
  static fromFile(tracePath: string, options: SimulationOptions = {}): Simulation {
    return new Simulation(readTraceFile(tracePath), options);
  }

  /** 틱 수 (생성 길이) */
  get tickCount(): number {
    return this.maxTickExclusive;
  }

  /** 조회 범위: 0..tickCount 포함 */
  private get lookupTicks(): number {
    return this.tickCount + 1;
  }

  // ============================================
  // 조회
  // ============================================

  getVehicleById(id: string): Vehicle {
    const vehicle = this.vehicles.get(id);
    if (!vehicle) {
      throw notFound(id);
    }
    return vehicle;
  }

  hasVehicle(id: string): boolean {
    return this.vehicles.has(id);
  }

  getVehicleIds(): string[] {
    return Array.from(this.vehicles.keys());
  }

  getDroneCounter(): number {
    return this.droneCounter;
  }

  getCategoryLabels(): Record<string, string> {
    return Object.fromEntries(this.categoryLabels);
  }

  /**
   * 차량 전체 틱 덤프 (부재 틱은 null)
   */
  getVehicleDict(vehicleId: string): Array<TraceVehicleRecord | null> {
    const vehicle = this.getVehicleById(vehicleId);
    const records: Array<TraceVehicleRecord | null> = [];
    for (let tick = 0; tick < this.lookupTicks; tick++) {
      records.push(vehicle.getTimestepRecord(tick));
    }
    return records;
  }

  /**
   * 존재하는 틱만 콘솔 출력
   */
  printVehicleInfo(vehicleId: string): void {
    for (const record of this.getVehicleDict(vehicleId)) {
      if (record) {
        console.log(record);
      }
    }
  }

  /**
   * 카테고리별 모든 차량 좌표 (부재 틱 = (0, 0))
   */
  vectorWithAllCoordinates(): CategoryCoordinates[] {
    const groups = new Map<VehicleCategory, CategoryCoordinates>();
    for (const [category, label] of this.categoryLabels) {
      groups.set(category, { category, label, tracks: [] });
    }

    for (const vehicle of this.vehicles.values()) {
      const track: GeoPoint[] = [];
      for (let tick = 0; tick < this.lookupTicks; tick++) {
        track.push(vehicle.getPosition(tick) ?? { ...ABSENT_POSITION });
      }
      groups.get(vehicle.type)?.tracks.push(track);
    }

    return Array.from(groups.values());
  }

  // ============================================
  // 드론 생성
  // ============================================

  private resolveSpeed(maxSpeed: number | undefined): number {
    return maxSpeed ?? this.defaultMaxSpeed;
  }

  private nextDroneId(): string {
    this.droneCounter += 1;
    const id = `drone${this.droneCounter}`;
    if (this.vehicles.has(id)) {
      console.warn(`[Simulation] ${id} 가 기존 차량 ID와 겹쳐 덮어씁니다`);
    }
    return id;
  }

  /**
   * 생성된 샘플을 새 드론으로 등록 (틱 = 샘플 인덱스, null 은 건너뜀)
   */
  private registerDrone(
    pattern: PatternKind,
    samples: Array<PatternSample | null>,
    extra: { maxSpeed?: number; followedId?: string } = {}
  ): string {
    const id = this.nextDroneId();
    const drone = new Vehicle(id, DRONE_CATEGORY);
    samples.forEach((sample, tick) => {
      if (sample) {
        drone.addGeneratedSample(tick, sample);
      }
    });
    this.vehicles.set(id, drone);

    this.logger?.log({
      event: 'drone_created',
      drone_id: id,
      pattern,
      sample_count: drone.sampleCount,
      max_speed: extra.maxSpeed,
      followed_id: extra.followedId,
    });
    console.log(`[Simulation] ${pattern} 드론 생성: ${id} (${drone.sampleCount} samples)`);
    return id;
  }

  private createFromPlan(pattern: PatternKind, plan: PatternPlan, maxSpeed: number): string {
    const samples = generatePattern(plan, this.tickCount, maxSpeed);
    return this.registerDrone(pattern, samples, { maxSpeed });
  }

  createDroneCircular(params: CircularPatternParams): string {
    const maxSpeed = this.resolveSpeed(params.maxSpeed);
    return this.createFromPlan('CIRCULAR', buildCircularPlan({ ...params, maxSpeed }), maxSpeed);
  }

  createDroneAngular(params: AngularPatternParams): string {
    const maxSpeed = this.resolveSpeed(params.maxSpeed);
    return this.createFromPlan('ANGULAR', buildAngularPlan({ ...params, maxSpeed }), maxSpeed);
  }

  createDroneTractor(params: TractorPatternParams): string {
    const maxSpeed = this.resolveSpeed(params.maxSpeed);
    return this.createFromPlan('TRACTOR', buildTractorPlan({ ...params, maxSpeed }), maxSpeed);
  }

  createDroneSquare(params: SquarePatternParams): string {
    const maxSpeed = this.resolveSpeed(params.maxSpeed);
    return this.createFromPlan('SQUARE', buildSquarePlan({ ...params, maxSpeed }), maxSpeed);
  }

  createDroneGeneric(params: GenericPatternParams): string {
    const maxSpeed = this.resolveSpeed(params.maxSpeed);
    return this.createFromPlan('GENERIC', buildGenericPlan({ ...params, maxSpeed }), maxSpeed);
  }

  createDroneStatic(point: GeoPoint): string {
    return this.registerDrone('STATIC', generateStatic(point, this.tickCount));
  }

  /**
   * 차량 추종 드론
   *
   * 첫 관측 이전 틱은 첫 위치로 채움 (소급 평활 없음)
   */
  createDroneFollowing(params: FollowingPatternParams): string {
    const vehicle = this.getVehicleById(params.vehicleId);
    const maxSpeed = this.resolveSpeed(params.maxSpeed);

    const track: Array<GeoPoint | null> = [];
    for (let tick = 0; tick < this.lookupTicks; tick++) {
      track.push(vehicle.getPosition(tick));
    }

    const samples = generateFollowingCoordinates(track, {
      offsetDistance: params.offsetDistance ?? DEFAULT_PATTERN_CONFIG.following_offset_distance,
      maxSpeed,
      smoothingFactor: params.smoothingFactor ?? this.smoothingFactor,
    });

    const firstIndex = samples.findIndex((sample) => sample !== null);
    const first = firstIndex >= 0 ? samples[firstIndex] : null;
    const filled = first
      ? samples.map((sample, tick) => (tick < firstIndex ? { lat: first.lat, lon: first.lon, speed: 0 } : sample))
      : samples;

    return this.registerDrone('FOLLOWING', filled, { maxSpeed, followedId: params.vehicleId });
  }

  // ============================================
  // 레지스트리 변경
  // ============================================

  addVehicle(vehicle: Vehicle): void {
    if (this.vehicles.has(vehicle.id)) {
      throw new SynthesisError(ErrorCode.DUPLICATE_ID, vehicle.id);
    }
    this.vehicles.set(vehicle.id, vehicle);
    if (!this.categoryLabels.has(vehicle.type)) {
      this.categoryLabels.set(vehicle.type, vehicle.type);
    }
  }

  removeVehicle(vehicleId: string): void {
    if (!this.vehicles.delete(vehicleId)) {
      throw notFound(vehicleId);
    }
    this.logger?.log({ event: 'vehicle_removed', vehicle_id: vehicleId });
    console.log(`[Simulation] 차량 제거: ${vehicleId}`);
  }

  /**
   * 카테고리 범례 변경
   */
  changeLegend(category: VehicleCategory, newLabel: string): void {
    const oldLabel = this.categoryLabels.get(category);
    if (oldLabel === undefined) {
      throw new SynthesisError(ErrorCode.UNKNOWN_CATEGORY, category);
    }
    this.categoryLabels.set(category, newLabel);
    this.logger?.log({ event: 'legend_changed', category, old_label: oldLabel, new_label: newLabel });
  }

  // ============================================
  // 내보내기
  // ============================================

  /**
   * 틱별 레코드 (레지스트리 삽입 순서)
   */
  recordsAt(tick: number): TraceVehicleRecord[] {
    const records: TraceVehicleRecord[] = [];
    for (const vehicle of this.vehicles.values()) {
      const record = vehicle.getTimestepRecord(tick);
      if (record) {
        records.push(record);
      }
    }
    return records;
  }

  /**
   * 트레이스 XML 문자열 생성
   */
  renderTimestepsXml(geo: boolean = true): string {
    return renderTrace(this.sourceXml, (tick) => this.recordsAt(tick), {
      maxTick: this.tickCount,
      geo,
    });
  }

  /**
   * 트레이스 XML 파일로 내보내기
   *
   * geo = false 면 최소 위경도 기준 평면 좌표(m)로 변환
   */
  exportTimestepsToXml(outputPath: string, geo: boolean = true): void {
    writeTraceFile(outputPath, this.renderTimestepsXml(geo));
    this.logger?.log({
      event: 'trace_exported',
      output_path: outputPath,
      geo,
      vehicle_count: this.vehicles.size,
    });
  }
}
