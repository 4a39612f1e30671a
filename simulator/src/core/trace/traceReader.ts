/**
 * 이동 트레이스 XML 파서
 *
 * <timestep time="..."><vehicle id x y angle type speed pos lane slope/></timestep>
 * x = 경도, y = 위도 (십진 도)
 */

import * as fs from 'fs';
import { DOMParser } from '@xmldom/xmldom';
import { TraceTimestep, TraceVehicleRecord } from '../../../../shared/schemas';
import { malformedInput, SynthesisError, ErrorCode } from '../errors/errorHandler';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

/** vehicle 레코드 필수 속성 */
export const VEHICLE_ATTRIBUTES = ['id', 'x', 'y', 'angle', 'type', 'speed', 'pos', 'lane', 'slope'] as const;

/** 읽어 들인 트레이스 (원문은 내보내기 시 구조 보존에 사용) */
export interface LoadedTrace {
  path: string | null;
  xml: string;
  timesteps: TraceTimestep[];
}

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

export function isBlankText(node: Node): boolean {
  return node.nodeType === TEXT_NODE && (node.nodeValue ?? '').trim() === '';
}

/**
 * 직계 자식 요소 목록
 */
export function childElements(parent: Node, tagName?: string): Element[] {
  const result: Element[] = [];
  const children = parent.childNodes;
  for (let i = 0; i < children.length; i++) {
    const node = children.item(i);
    if (node && isElement(node) && (!tagName || node.tagName === tagName)) {
      result.push(node);
    }
  }
  return result;
}

/**
 * 트레이스 time 값 → 내부 틱 (틱 0 예약을 위해 +1)
 */
export function timeToTick(time: number): number {
  return Math.trunc(time) + 1;
}

/**
 * XML 문서 파싱 (오류는 MALFORMED_INPUT 으로 변환)
 */
export function parseXmlDocument(xml: string, source: string): Document {
  const fail = (msg: unknown): never => {
    throw malformedInput(`${source}: ${String(msg)}`);
  };
  const parser = new DOMParser({
    errorHandler: {
      warning: (msg: unknown) => console.warn(`[Trace] ${source}: ${String(msg)}`),
      error: fail,
      fatalError: fail,
    },
  });

  const doc = parser.parseFromString(xml, 'text/xml');
  if (!doc || !doc.documentElement) {
    throw malformedInput(`${source}: missing root element`);
  }
  return doc;
}

export function requireAttribute(element: Element, name: string, source: string): string {
  if (!element.hasAttribute(name)) {
    throw malformedInput(`${source}: <${element.tagName}> is missing attribute "${name}"`);
  }
  return element.getAttribute(name) ?? '';
}

export function requireNumber(element: Element, name: string, source: string): number {
  const raw = requireAttribute(element, name, source);
  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw malformedInput(`${source}: <${element.tagName}> attribute "${name}" is not a number ("${raw}")`);
  }
  return value;
}

function parseVehicle(element: Element, source: string): TraceVehicleRecord {
  return {
    id: requireAttribute(element, 'id', source),
    x: requireNumber(element, 'x', source),
    y: requireNumber(element, 'y', source),
    angle: requireNumber(element, 'angle', source),
    type: requireAttribute(element, 'type', source),
    speed: requireNumber(element, 'speed', source),
    pos: requireNumber(element, 'pos', source),
    lane: requireAttribute(element, 'lane', source),
    slope: requireNumber(element, 'slope', source),
  };
}

/**
 * XML 문자열 → timestep 목록
 */
export function parseTrace(xml: string, source: string = '<memory>'): TraceTimestep[] {
  const doc = parseXmlDocument(xml, source);

  return childElements(doc.documentElement, 'timestep').map((timestep) => ({
    time: requireNumber(timestep, 'time', source),
    vehicles: childElements(timestep, 'vehicle').map((vehicle) => parseVehicle(vehicle, source)),
  }));
}

/**
 * 트레이스 파일 읽기
 */
export function readTraceFile(tracePath: string): LoadedTrace {
  let xml: string;
  try {
    xml = fs.readFileSync(tracePath, 'utf-8');
  } catch (error) {
    throw new SynthesisError(
      ErrorCode.MALFORMED_INPUT,
      `cannot read trace ${tracePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const timesteps = parseTrace(xml, tracePath);
  console.log(`[Trace] 트레이스 로드: ${tracePath} (${timesteps.length} timesteps)`);
  return { path: tracePath, xml, timesteps };
}

/**
 * 메모리 상의 XML 로 트레이스 구성 (테스트/도구용)
 */
export function loadTraceFromString(xml: string): LoadedTrace {
  return { path: null, xml, timesteps: parseTrace(xml) };
}
