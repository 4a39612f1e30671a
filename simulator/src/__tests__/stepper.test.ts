/**
 * 패턴 스테퍼 테스트
 */

import { generatePattern, generateStatic, roundSpeed, PatternPlan } from '../core/patterns/stepper';
import { ErrorCode, SynthesisError } from '../core/errors/errorHandler';
import { metersToDegrees } from '../core/geo/geodesy';

describe('Pattern Stepper', () => {
  const start = { lat: 37.5, lon: 127.0 };

  function expectInvalid(fn: () => unknown): void {
    try {
      fn();
    } catch (error) {
      expect(error).toBeInstanceOf(SynthesisError);
      if (error instanceof SynthesisError) {
        expect(error.code).toBe(ErrorCode.INVALID_PARAMETER);
      }
      return;
    }
    throw new Error('INVALID_PARAMETER 에러가 발생하지 않음');
  }

  describe('generatePattern', () => {
    const plan: PatternPlan = { startPoint: start, distances: [100, 100], bearings: [0, 90] };

    it('정확히 sampleCount 개의 샘플을 생성해야 함', () => {
      expect(generatePattern(plan, 0, 10)).toHaveLength(0);
      expect(generatePattern(plan, 1, 10)).toHaveLength(1);
      expect(generatePattern(plan, 57, 10)).toHaveLength(57);
    });

    it('첫 샘플은 시작점, 속도 0 이어야 함', () => {
      const samples = generatePattern(plan, 5, 10);
      expect(samples[0]).toEqual({ lat: 37.5, lon: 127.0, speed: 0 });
    });

    it('이후 샘플의 속도는 최대 속도여야 함', () => {
      const samples = generatePattern(plan, 10, 12.5);
      expect(samples.slice(1).every((s) => s.speed === 12.5)).toBe(true);
    });

    it('직선 구간에서는 틱마다 한 보폭씩 전진해야 함', () => {
      const samples = generatePattern({ startPoint: start, distances: [1000], bearings: [0] }, 6, 10);
      const step = metersToDegrees(10);

      for (let i = 1; i < 6; i++) {
        expect(samples[i].lat - start.lat).toBeCloseTo(step * i, 12);
        expect(samples[i].lon).toBeCloseTo(start.lon, 12);
      }
    });

    it('모서리에서 남는 보폭을 다음 구간으로 이월해야 함', () => {
      // 첫 구간 목표: 100/√2 ≈ 70.71m, 보폭 30m
      const samples = generatePattern(plan, 4, 30);
      const firstLeg = 100 / Math.SQRT2;

      expect(samples[2].lat - start.lat).toBeCloseTo(metersToDegrees(60), 12);
      expect(samples[3].lat - start.lat).toBeCloseTo(metersToDegrees(firstLeg), 10);
      expect(samples[3].lon - start.lon).toBeCloseTo(metersToDegrees(90 - firstLeg), 10);
    });

    it('구간 경계에 정확히 도달하면 다음 틱은 새 방위로 한 보폭 전진해야 함', () => {
      const samples = generatePattern(
        { startPoint: start, distances: [10 * Math.SQRT2, 20], bearings: [0, 90] },
        4,
        10
      );
      const step = metersToDegrees(10);

      expect(samples[1].lat - start.lat).toBeCloseTo(step, 10);
      expect(samples[1].lon - start.lon).toBeCloseTo(0, 10);
      expect(samples[2].lat - start.lat).toBeCloseTo(step, 10);
      expect(samples[2].lon - start.lon).toBeCloseTo(step, 10);
      expect(samples[3].lon - start.lon).toBeCloseTo(2 * step, 10);
    });

    it('구간 목록을 순환 재생해야 함', () => {
      // 남북 왕복: 한 주기 100m = 보폭 5m × 20틱
      const samples = generatePattern(
        { startPoint: start, distances: [50, 50], bearings: [0, 180] },
        45,
        5
      );

      for (let k = 0; k < 25; k++) {
        expect(samples[k + 20].lat).toBeCloseTo(samples[k].lat, 10);
        expect(samples[k + 20].lon).toBeCloseTo(samples[k].lon, 10);
      }

      // 북쪽 끝은 첫 구간 목표(50/√2 m)를 넘지 않음
      const maxLat = Math.max(...samples.map((s) => s.lat));
      expect(maxLat - start.lat).toBeLessThanOrEqual(metersToDegrees(50 / Math.SQRT2) + 1e-12);
    });

    it('잘못된 입력은 INVALID_PARAMETER 로 거부해야 함', () => {
      expectInvalid(() => generatePattern({ startPoint: start, distances: [], bearings: [] }, 5, 10));
      expectInvalid(() => generatePattern({ startPoint: start, distances: [10, 10], bearings: [0] }, 5, 10));
      expectInvalid(() => generatePattern({ startPoint: start, distances: [10, 0], bearings: [0, 90] }, 5, 10));
      expectInvalid(() => generatePattern({ startPoint: start, distances: [10], bearings: [NaN] }, 5, 10));
      expectInvalid(() => generatePattern(plan, 5, 0));
      expectInvalid(() => generatePattern(plan, -1, 10));
      expectInvalid(() => generatePattern({ startPoint: { lat: Infinity, lon: 0 }, distances: [10], bearings: [0] }, 5, 10));
    });
  });

  describe('generateStatic', () => {
    it('모든 샘플이 같은 지점, 속도 0 이어야 함', () => {
      const samples = generateStatic({ lat: 1, lon: 1 }, 3);
      expect(samples).toEqual([
        { lat: 1, lon: 1, speed: 0 },
        { lat: 1, lon: 1, speed: 0 },
        { lat: 1, lon: 1, speed: 0 },
      ]);
    });

    it('음수 샘플 수는 거부해야 함', () => {
      expectInvalid(() => generateStatic({ lat: 1, lon: 1 }, -2));
    });
  });

  describe('roundSpeed', () => {
    it('소수 둘째 자리까지 반올림해야 함', () => {
      expect(roundSpeed(10.456)).toBe(10.46);
      expect(roundSpeed(7.071067)).toBe(7.07);
      expect(roundSpeed(3)).toBe(3);
    });
  });
});
