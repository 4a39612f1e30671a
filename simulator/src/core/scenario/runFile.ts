/**
 * 실행 파일 (run file) 처리
 *
 * JSON 객체의 그룹을 파일 순서대로 실행:
 *   Simulation → Drone* → ExportXML* / ChangeLegend* / ...
 * 그룹 이름은 접두사로 구분하고, 알 수 없는 그룹은 경고 후 건너뜀.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { GeoPoint, RunGroupKind, RUN_GROUP_PREFIXES, DEFAULT_PATTERN_CONFIG } from '../../../../shared/schemas';
import { Simulation } from '../../simulation';
import { ErrorCode, ErrorLogger, SynthesisError, isSynthesisError, malformedInput } from '../errors/errorHandler';
import { RunLogger, getLogger } from '../logging/logger';
import { getConfig } from '../../config';

// ============================================
// 그룹 스키마
// ============================================

const finite = z.number().finite();
const positive = finite.positive();

/** [lat, lon] 배열 → GeoPoint */
const pointSchema = z
  .tuple([finite, finite])
  .transform(([lat, lon]): GeoPoint => ({ lat, lon }));

const simulationGroupSchema = z.object({
  trace_path: z.string().min(1),
});

const circularGroupSchema = z.object({
  center: pointSchema,
  radius_meters: positive,
  max_speed: positive.optional(),
  start_angle: finite.default(DEFAULT_PATTERN_CONFIG.circular_start_angle),
});

const angularGroupSchema = z.object({
  start_point: pointSchema,
  max_length: positive,
  start_angle: finite.default(DEFAULT_PATTERN_CONFIG.angular_start_angle),
  max_turns: z.number().int().min(1).default(DEFAULT_PATTERN_CONFIG.angular_max_turns),
  angle_alpha: finite.default(DEFAULT_PATTERN_CONFIG.angular_angle_alpha),
  max_speed: positive.optional(),
});

const tractorGroupSchema = z.object({
  start_point: pointSchema,
  width_between_tracks: positive,
  max_length: positive,
  max_turns: z.number().int().min(1),
  orientation: z.enum(['horizontal', 'vertical']).default(DEFAULT_PATTERN_CONFIG.tractor_orientation),
  max_speed: positive.optional(),
});

const staticGroupSchema = z.object({
  point: pointSchema,
});

const squareGroupSchema = z.object({
  center_point: pointSchema,
  side_length: positive,
  angle_degrees: finite.default(DEFAULT_PATTERN_CONFIG.square_angle_degrees),
  max_speed: positive.optional(),
});

const followingGroupSchema = z.object({
  vehicle_id: z.string().min(1),
  offset_distance: finite.min(0).default(DEFAULT_PATTERN_CONFIG.following_offset_distance),
  max_speed: positive.optional(),
});

const genericGroupSchema = z.object({
  start_point: pointSchema,
  distances: z.array(positive).min(1),
  bearings: z.array(finite).min(1),
  max_speed: positive.optional(),
});

const exportGroupSchema = z.object({
  new_xml_path: z.string().min(1),
  geo: z.boolean().default(true),
});

const legendGroupSchema = z.object({
  old_legend: z.string().min(1),
  new_legend: z.string(),
});

const vehicleGroupSchema = z.object({
  vehicle_id: z.string().min(1),
});

const runDocumentSchema = z.record(z.unknown());

// ============================================
// 실행 결과
// ============================================

export interface ExecutedGroup {
  name: string;
  kind: RunGroupKind;
  droneId?: string;
}

export interface RunReport {
  runId: string;
  runFile: string | null;
  groups: ExecutedGroup[];
  droneIds: string[];
  skipped: string[];
  exports: string[];
  simulation: Simulation;
}

export interface RunOptions {
  logger?: RunLogger;
  outputDir?: string;         // 상대 내보내기 경로의 기준 (기본: OUTPUT_DIR)
  defaultMaxSpeed?: number;   // 기본: DEFAULT_MAX_SPEED
  smoothingFactor?: number;   // 기본: FOLLOW_SMOOTHING_FACTOR
  runFile?: string;           // 로그 기록용 실행 파일 경로
}

/**
 * 그룹 이름 → 종류 (알 수 없으면 null)
 */
export function classifyGroup(name: string): RunGroupKind | null {
  if (name === 'Simulation') return 'Simulation';
  return RUN_GROUP_PREFIXES.find((prefix) => name.startsWith(prefix)) ?? null;
}

/**
 * zod 파싱 실패 → MALFORMED_INPUT
 */
function parseGroup<T extends z.ZodTypeAny>(schema: T, name: string, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(group)'}: ${issue.message}`)
      .join('; ');
    throw malformedInput(`group ${name}: ${issues}`);
  }
  return result.data;
}

function defaultLogger(): RunLogger {
  const config = getConfig();
  return getLogger({
    logsDir: config.logsDir,
    enabled: config.logEnabled,
    consoleOutput: config.logConsoleOutput,
  });
}

function resolveFrom(baseDir: string, target: string): string {
  return path.isAbsolute(target) ? target : path.resolve(baseDir, target);
}

// ============================================
// 실행
// ============================================

/**
 * 메모리 상의 실행 문서 실행
 *
 * trace_path 는 baseDir 기준, new_xml_path 는 outputDir 기준으로 해석.
 */
export function runScenario(document: unknown, baseDir: string, options: RunOptions = {}): RunReport {
  const groups = parseGroup(runDocumentSchema, '(root)', document);
  const entries = Object.entries(groups);

  const simulationEntry = entries.find(([name]) => name === 'Simulation');
  if (!simulationEntry) {
    throw malformedInput('run file has no Simulation group');
  }
  if (entries[0][0] !== 'Simulation') {
    throw malformedInput('Simulation group must come first');
  }

  const outputDir = options.outputDir ?? getConfig().outputDir;
  const logger = options.logger ?? defaultLogger();

  const runFile = options.runFile ?? null;
  const runId = logger.startRun(runFile);
  const errorLogger = ErrorLogger.getInstance();

  let currentGroup = 'Simulation';
  try {
    const { trace_path } = parseGroup(simulationGroupSchema, 'Simulation', simulationEntry[1]);
    const simulation = Simulation.fromFile(resolveFrom(baseDir, trace_path), {
      logger,
      defaultMaxSpeed: options.defaultMaxSpeed ?? getConfig().defaultMaxSpeed,
      smoothingFactor: options.smoothingFactor ?? getConfig().followSmoothingFactor,
    });

    const report: RunReport = {
      runId,
      runFile,
      groups: [{ name: 'Simulation', kind: 'Simulation' }],
      droneIds: [],
      skipped: [],
      exports: [],
      simulation,
    };

    for (const [name, value] of entries.slice(1)) {
      currentGroup = name;
      const kind = classifyGroup(name);

      if (kind === null || kind === 'Simulation') {
        console.warn(`[RunFile] 알 수 없는 그룹 건너뜀: ${name}`);
        logger.log({ event: 'group_skipped', group: name });
        report.skipped.push(name);
        continue;
      }

      const droneId = executeGroup(simulation, kind, name, value, outputDir, report);
      report.groups.push(droneId === undefined ? { name, kind } : { name, kind, droneId });
      if (droneId !== undefined) {
        report.droneIds.push(droneId);
      }
    }

    return report;
  } catch (error) {
    if (isSynthesisError(error)) {
      errorLogger.log(error, currentGroup);
    }
    throw error;
  } finally {
    logger.endRun();
  }
}

/**
 * 그룹 하나 실행. 드론 그룹이면 생성된 ID 반환
 */
function executeGroup(
  simulation: Simulation,
  kind: Exclude<RunGroupKind, 'Simulation'>,
  name: string,
  value: unknown,
  outputDir: string,
  report: RunReport
): string | undefined {
  switch (kind) {
    case 'DroneCircular': {
      const group = parseGroup(circularGroupSchema, name, value);
      return simulation.createDroneCircular({
        center: group.center,
        radiusMeters: group.radius_meters,
        maxSpeed: group.max_speed,
        startAngle: group.start_angle,
      });
    }
    case 'DroneAngular': {
      const group = parseGroup(angularGroupSchema, name, value);
      return simulation.createDroneAngular({
        startPoint: group.start_point,
        maxLength: group.max_length,
        startAngle: group.start_angle,
        maxTurns: group.max_turns,
        angleAlpha: group.angle_alpha,
        maxSpeed: group.max_speed,
      });
    }
    case 'DroneTractor': {
      const group = parseGroup(tractorGroupSchema, name, value);
      return simulation.createDroneTractor({
        startPoint: group.start_point,
        widthBetweenTracks: group.width_between_tracks,
        maxLength: group.max_length,
        maxTurns: group.max_turns,
        orientation: group.orientation,
        maxSpeed: group.max_speed,
      });
    }
    case 'DroneStatic': {
      const group = parseGroup(staticGroupSchema, name, value);
      return simulation.createDroneStatic(group.point);
    }
    case 'DroneSquare': {
      const group = parseGroup(squareGroupSchema, name, value);
      return simulation.createDroneSquare({
        centerPoint: group.center_point,
        sideLength: group.side_length,
        angleDegrees: group.angle_degrees,
        maxSpeed: group.max_speed,
      });
    }
    case 'DroneFollowing': {
      const group = parseGroup(followingGroupSchema, name, value);
      return simulation.createDroneFollowing({
        vehicleId: group.vehicle_id,
        offsetDistance: group.offset_distance,
        maxSpeed: group.max_speed,
      });
    }
    case 'DroneGeneric': {
      const group = parseGroup(genericGroupSchema, name, value);
      return simulation.createDroneGeneric({
        startPoint: group.start_point,
        distances: group.distances,
        bearings: group.bearings,
        maxSpeed: group.max_speed,
      });
    }
    case 'ExportXML': {
      const group = parseGroup(exportGroupSchema, name, value);
      const outputPath = resolveFrom(outputDir, group.new_xml_path);
      simulation.exportTimestepsToXml(outputPath, group.geo);
      report.exports.push(outputPath);
      console.log(`[RunFile] 내보내기 완료: ${outputPath}`);
      return undefined;
    }
    case 'ChangeLegend': {
      const group = parseGroup(legendGroupSchema, name, value);
      simulation.changeLegend(group.old_legend, group.new_legend);
      return undefined;
    }
    case 'PrintVehicleInfo': {
      const group = parseGroup(vehicleGroupSchema, name, value);
      simulation.printVehicleInfo(group.vehicle_id);
      return undefined;
    }
    case 'RemoveVehicle': {
      const group = parseGroup(vehicleGroupSchema, name, value);
      simulation.removeVehicle(group.vehicle_id);
      return undefined;
    }
  }
}

/**
 * 실행 파일 읽기 + 실행
 */
export function runScenarioFile(runFilePath: string, options: RunOptions = {}): RunReport {
  let document: unknown;
  try {
    document = JSON.parse(fs.readFileSync(runFilePath, 'utf-8'));
  } catch (error) {
    throw new SynthesisError(
      ErrorCode.MALFORMED_INPUT,
      `cannot read run file ${runFilePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  console.log(`[RunFile] 실행 파일: ${runFilePath}`);
  return runScenario(document, path.dirname(path.resolve(runFilePath)), {
    ...options,
    runFile: options.runFile ?? runFilePath,
  });
}
