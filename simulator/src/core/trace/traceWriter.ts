/**
 * 트레이스 XML 내보내기
 *
 * 원본 문서 구조는 그대로 두고 각 timestep 의 vehicle 레코드만
 * 레지스트리 내용으로 교체. 선택적으로 평면 좌표(m)로 재투영.
 */

import * as fs from 'fs';
import * as path from 'path';
import { XMLSerializer } from '@xmldom/xmldom';
import { TraceVehicleRecord } from '../../../../shared/schemas';
import {
  VEHICLE_ATTRIBUTES,
  childElements,
  isBlankText,
  isElement,
  parseXmlDocument,
  requireNumber,
  timeToTick,
} from './traceReader';

/** 평면 투영 지구 반지름 (m) */
const PLANAR_EARTH_RADIUS = 6378137;

const VEHICLE_INDENT = '        ';
const TIMESTEP_INDENT = '    ';
const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

export interface ExportOptions {
  maxTick: number;   // 이 틱 이하의 timestep 만 레코드 기록
  geo: boolean;      // false 면 평면 좌표(m)로 변환
}

/** 틱별 vehicle 레코드 공급자 */
export type RecordSource = (tick: number) => TraceVehicleRecord[];

export function formatNumber(value: number): string {
  return String(value);
}

function roundPlanar(value: number): number {
  return Math.round(value * 100) / 100;
}

function createVehicleElement(doc: Document, record: TraceVehicleRecord): Element {
  const element = doc.createElement('vehicle');
  for (const name of VEHICLE_ATTRIBUTES) {
    const value = record[name];
    element.setAttribute(name, typeof value === 'number' ? formatNumber(value) : value);
  }
  return element;
}

/**
 * timestep 하나의 vehicle 교체 + 들여쓰기 재구성
 */
function rewriteTimestep(doc: Document, timestep: Element, records: TraceVehicleRecord[]): void {
  const children = Array.from({ length: timestep.childNodes.length }, (_, i) => timestep.childNodes.item(i));
  for (const child of children) {
    if (!child) continue;
    if ((isElement(child) && child.tagName === 'vehicle') || isBlankText(child)) {
      timestep.removeChild(child);
    }
  }

  for (const record of records) {
    timestep.appendChild(createVehicleElement(doc, record));
  }

  const kept = Array.from({ length: timestep.childNodes.length }, (_, i) => timestep.childNodes.item(i));
  if (kept.length === 0) return;

  for (const child of kept) {
    if (child) timestep.insertBefore(doc.createTextNode(`\n${VEHICLE_INDENT}`), child);
  }
  timestep.appendChild(doc.createTextNode(`\n${TIMESTEP_INDENT}`));
}

/**
 * 모든 vehicle 좌표를 최소 위경도 기준 평면 좌표(m)로 변환
 */
export function projectToPlanar(doc: Document): void {
  const vehicles: Element[] = [];
  for (const timestep of childElements(doc.documentElement, 'timestep')) {
    for (const vehicle of childElements(timestep, 'vehicle')) {
      vehicles.push(vehicle);
    }
  }
  if (vehicles.length === 0) return;

  const coordinates = vehicles.map((vehicle) => ({
    lon: requireNumber(vehicle, 'x', 'export'),
    lat: requireNumber(vehicle, 'y', 'export'),
  }));
  // Math.min(...) 은 인자 개수 한도에 걸림
  let minLon = Infinity;
  let minLat = Infinity;
  for (const { lon, lat } of coordinates) {
    if (lon < minLon) minLon = lon;
    if (lat < minLat) minLat = lat;
  }
  const cosMinLat = Math.cos((minLat * Math.PI) / 180);

  vehicles.forEach((vehicle, i) => {
    const { lat, lon } = coordinates[i];
    const x = PLANAR_EARTH_RADIUS * ((lon - minLon) * Math.PI / 180) * cosMinLat;
    const y = PLANAR_EARTH_RADIUS * ((lat - minLat) * Math.PI / 180);
    vehicle.setAttribute('x', formatNumber(roundPlanar(x)));
    vehicle.setAttribute('y', formatNumber(roundPlanar(y)));
  });
}

/**
 * 원본 XML + 레코드 공급자 → 내보낼 XML 문자열
 */
export function renderTrace(sourceXml: string, recordsAt: RecordSource, options: ExportOptions): string {
  const doc = parseXmlDocument(sourceXml, 'source trace');

  for (const timestep of childElements(doc.documentElement, 'timestep')) {
    const tick = timeToTick(requireNumber(timestep, 'time', 'source trace'));
    const records = tick <= options.maxTick ? recordsAt(tick) : [];
    rewriteTimestep(doc, timestep, records);
  }

  if (!options.geo) {
    projectToPlanar(doc);
  }

  const body = new XMLSerializer().serializeToString(doc);
  return body.startsWith('<?xml') ? body : `${XML_DECLARATION}\n${body}`;
}

/**
 * 파일로 저장
 */
export function writeTraceFile(outputPath: string, xml: string): void {
  const dir = path.dirname(outputPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(outputPath, xml, 'utf-8');
  console.log(`[Trace] 트레이스 저장: ${outputPath}`);
}
