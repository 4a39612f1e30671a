/**
 * 설정 모듈 테스트
 */

import { loadConfig, getConfig } from '../config';

describe('Config Module', () => {
  beforeEach(() => {
    // 환경 변수 초기화
    delete process.env.LOGS_DIR;
    delete process.env.LOG_CONSOLE_OUTPUT;
    delete process.env.LOG_ENABLED;
    delete process.env.OUTPUT_DIR;
    delete process.env.DEFAULT_MAX_SPEED;
    delete process.env.FOLLOW_SMOOTHING_FACTOR;
    process.env.NODE_ENV = 'test';
  });

  describe('loadConfig', () => {
    it('환경 변수가 없을 때 기본값을 반환해야 함', () => {
      delete process.env.NODE_ENV;
      const config = loadConfig();

      expect(config.logsDir).toBe('./logs');
      expect(config.logConsoleOutput).toBe(false);
      expect(config.logEnabled).toBe(true);
      expect(config.outputDir).toBe('./output');
      expect(config.defaultMaxSpeed).toBe(10);
      expect(config.followSmoothingFactor).toBe(0.4);
      expect(config.nodeEnv).toBe('development');
    });

    it('환경 변수에서 설정을 로드해야 함', () => {
      process.env.LOGS_DIR = './custom-logs';
      process.env.LOG_CONSOLE_OUTPUT = 'true';
      process.env.LOG_ENABLED = 'false';
      process.env.OUTPUT_DIR = './custom-output';
      process.env.DEFAULT_MAX_SPEED = '25.5';
      process.env.FOLLOW_SMOOTHING_FACTOR = '1';
      process.env.NODE_ENV = 'production';

      const config = loadConfig();

      expect(config.logsDir).toBe('./custom-logs');
      expect(config.logConsoleOutput).toBe(true);
      expect(config.logEnabled).toBe(false);
      expect(config.outputDir).toBe('./custom-output');
      expect(config.defaultMaxSpeed).toBe(25.5);
      expect(config.followSmoothingFactor).toBe(1);
      expect(config.nodeEnv).toBe('production');
    });

    it('속도를 숫자로 파싱해야 함', () => {
      process.env.DEFAULT_MAX_SPEED = '12';
      const config = loadConfig();
      expect(config.defaultMaxSpeed).toBe(12);
      expect(typeof config.defaultMaxSpeed).toBe('number');
    });

    it('0 이하의 기본 속도는 거부해야 함', () => {
      process.env.DEFAULT_MAX_SPEED = '0';
      expect(() => loadConfig()).toThrow('환경 변수 설정이 올바르지 않습니다');
    });

    it('범위를 벗어난 평활 계수는 거부해야 함', () => {
      process.env.FOLLOW_SMOOTHING_FACTOR = '1.5';
      expect(() => loadConfig()).toThrow('환경 변수 설정이 올바르지 않습니다');
    });
  });

  describe('getConfig', () => {
    it('싱글톤 인스턴스를 반환해야 함', () => {
      const config1 = getConfig();
      const config2 = getConfig();

      expect(config1).toBe(config2);
    });

    it('환경 변수 변경 후에도 같은 인스턴스를 반환해야 함', () => {
      const config1 = getConfig();
      process.env.DEFAULT_MAX_SPEED = '99';
      const config2 = getConfig();

      // 싱글톤이므로 같은 인스턴스
      expect(config1).toBe(config2);
      // 하지만 값은 처음 로드된 값 유지
      expect(config2.defaultMaxSpeed).toBe(config1.defaultMaxSpeed);
    });
  });
});
