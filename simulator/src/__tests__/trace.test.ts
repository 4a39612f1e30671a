/**
 * 트레이스 XML 입출력 테스트
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { parseTrace, readTraceFile, timeToTick } from '../core/trace/traceReader';
import { renderTrace, writeTraceFile } from '../core/trace/traceWriter';
import { ErrorCode, SynthesisError } from '../core/errors/errorHandler';
import { TraceVehicleRecord } from '../../../shared/schemas';

const SOURCE_XML = `<?xml version="1.0" encoding="UTF-8"?>
<fcd-export>
    <timestep time="0.00">
        <vehicle id="veh0" x="127.0" y="37.5" angle="90.00" type="passenger" speed="0.00" pos="5.10" lane="e1_0" slope="0.00"/>
    </timestep>
    <timestep time="1.00">
        <vehicle id="veh0" x="127.001" y="37.5" angle="90.00" type="passenger" speed="8.25" pos="13.35" lane="e1_0" slope="0.00"/>
    </timestep>
</fcd-export>
`;

function drone(overrides: Partial<TraceVehicleRecord> = {}): TraceVehicleRecord {
  return {
    id: 'drone1',
    x: 5,
    y: 10,
    angle: 0,
    type: 'UAV',
    speed: 0,
    pos: 0,
    lane: '0',
    slope: 0,
    ...overrides,
  };
}

function expectMalformed(fn: () => unknown): void {
  try {
    fn();
  } catch (error) {
    expect(error).toBeInstanceOf(SynthesisError);
    if (error instanceof SynthesisError) {
      expect(error.code).toBe(ErrorCode.MALFORMED_INPUT);
    }
    return;
  }
  throw new Error('MALFORMED_INPUT 에러가 발생하지 않음');
}

describe('Trace Reader', () => {
  it('timestep 과 vehicle 레코드를 읽어야 함', () => {
    const timesteps = parseTrace(SOURCE_XML);

    expect(timesteps).toHaveLength(2);
    expect(timesteps[0].time).toBe(0);
    expect(timesteps[1].time).toBe(1);
    expect(timesteps[0].vehicles).toEqual([
      {
        id: 'veh0',
        x: 127,
        y: 37.5,
        angle: 90,
        type: 'passenger',
        speed: 0,
        pos: 5.1,
        lane: 'e1_0',
        slope: 0,
      },
    ]);
  });

  it('time 은 버림 후 +1 틱으로 변환되어야 함', () => {
    expect(timeToTick(0)).toBe(1);
    expect(timeToTick(1.9)).toBe(2);
    expect(timeToTick(41.25)).toBe(42);
  });

  it('vehicle 이 없는 timestep 도 유지해야 함', () => {
    const timesteps = parseTrace('<fcd-export><timestep time="0"/><timestep time="1"/></fcd-export>');
    expect(timesteps).toEqual([
      { time: 0, vehicles: [] },
      { time: 1, vehicles: [] },
    ]);
  });

  it('필수 속성이 없으면 MALFORMED_INPUT 이어야 함', () => {
    expectMalformed(() =>
      parseTrace('<fcd-export><timestep time="0"><vehicle id="a" x="1" y="2" angle="0" type="car" speed="0" pos="0" lane="l"/></timestep></fcd-export>')
    );
    expectMalformed(() => parseTrace('<fcd-export><timestep><vehicle/></timestep></fcd-export>'));
  });

  it('숫자 필드가 숫자가 아니면 MALFORMED_INPUT 이어야 함', () => {
    expectMalformed(() =>
      parseTrace('<fcd-export><timestep time="0"><vehicle id="a" x="east" y="2" angle="0" type="car" speed="0" pos="0" lane="l" slope="0"/></timestep></fcd-export>')
    );
    expectMalformed(() => parseTrace('<fcd-export><timestep time=""/></fcd-export>'));
  });

  it('XML 이 아니면 MALFORMED_INPUT 이어야 함', () => {
    expectMalformed(() => parseTrace(''));
    expectMalformed(() => parseTrace('not xml at all'));
  });

  it('파일을 읽을 수 없으면 MALFORMED_INPUT 이어야 함', () => {
    expectMalformed(() => readTraceFile(path.join(os.tmpdir(), 'uav-trace-missing', 'none.xml')));
  });
});

describe('Trace Writer', () => {
  it('vehicle 속성을 정해진 순서로 기록해야 함', () => {
    const output = renderTrace(SOURCE_XML, () => [drone()], { maxTick: 3, geo: true });

    expect(output).toContain(
      '<vehicle id="drone1" x="5" y="10" angle="0" type="UAV" speed="0" pos="0" lane="0" slope="0"/>'
    );
    expect(output).not.toContain('id="veh0"');
  });

  it('timestep 의 기존 vehicle 을 +1 틱 레코드로 교체해야 함', () => {
    const requested: number[] = [];
    const output = renderTrace(
      SOURCE_XML,
      (tick) => {
        requested.push(tick);
        return [drone({ x: tick })];
      },
      { maxTick: 3, geo: true }
    );

    expect(requested).toEqual([1, 2]);
    const timesteps = parseTrace(output);
    expect(timesteps[0].vehicles.map((v) => v.x)).toEqual([1]);
    expect(timesteps[1].vehicles.map((v) => v.x)).toEqual([2]);
  });

  it('maxTick 을 넘는 timestep 은 비워야 함', () => {
    const output = renderTrace(SOURCE_XML, () => [drone()], { maxTick: 1, geo: true });
    const timesteps = parseTrace(output);

    expect(timesteps[0].vehicles).toHaveLength(1);
    expect(timesteps[1].vehicles).toEqual([]);
    expect(output).toContain('<timestep time="1.00"/>');
  });

  it('vehicle 을 들여쓰기해서 기록해야 함', () => {
    const output = renderTrace(SOURCE_XML, () => [drone()], { maxTick: 3, geo: true });
    expect(output).toContain('<timestep time="0.00">\n        <vehicle id="drone1"');
    expect(output).toContain('slope="0"/>\n    </timestep>');
  });

  it('XML 선언이 없으면 추가해야 함', () => {
    const output = renderTrace('<fcd-export><timestep time="0"/></fcd-export>', () => [], {
      maxTick: 1,
      geo: true,
    });
    expect(output.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<fcd-export>')).toBe(true);
  });

  it('geo = false 면 최소 위경도 기준 평면 좌표(m)로 변환해야 함', () => {
    const source = '<fcd-export><timestep time="0"/></fcd-export>';
    const output = renderTrace(
      source,
      () => [drone({ id: 'a', x: 10, y: 0 }), drone({ id: 'b', x: 10.001, y: 0.001 })],
      { maxTick: 1, geo: false }
    );
    const [a, b] = parseTrace(output)[0].vehicles;

    expect(a.x).toBe(0);
    expect(a.y).toBe(0);
    // 6378137 · (0.001° in rad) ≈ 111.319m
    expect(b.x).toBe(111.32);
    expect(b.y).toBe(111.32);
  });

  it('레코드가 많은 트레이스도 평면 좌표로 변환해야 함', () => {
    // 2000 timestep × 100 레코드 = 200,000 vehicle
    const timesteps = Array.from({ length: 2000 }, (_, i) => `<timestep time="${i}"/>`).join('');
    const source = `<fcd-export>${timesteps}</fcd-export>`;
    const records = Array.from({ length: 100 }, (_, j) => drone({ id: `v${j}`, x: 10 + j * 0.001, y: 0 }));

    const output = renderTrace(source, () => records, { maxTick: 2001, geo: false });
    const parsed = parseTrace(output);

    expect(parsed).toHaveLength(2000);
    const last = parsed[1999].vehicles;
    expect(last).toHaveLength(100);
    expect(last[0].x).toBe(0);
    expect(last[0].y).toBe(0);
    expect(last[99].x).toBe(11020.63);
  }, 60000);

  it('출력 디렉토리가 없으면 만들어야 함', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'uav-trace-'));
    const target = path.join(dir, 'nested', 'out.xml');

    writeTraceFile(target, '<fcd-export/>');

    expect(fs.readFileSync(target, 'utf-8')).toBe('<fcd-export/>');
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
