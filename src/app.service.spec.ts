import { AppService } from './app.service';

describe('AppService', () => {
  it('should report ok with a connected database', () => {
    const service = new AppService(
      { readyState: 1 } as any,
      { isLockServiceAvailable: jest.fn().mockReturnValue(false) } as any,
    );

    const health = service.getHealth();

    expect(health.status).toBe('ok');
    expect(health.database.mongodb).toBe('connected');
    expect(health.locks.redis).toBe('local-only');
  });

  it('should report degraded when MongoDB is down', () => {
    const service = new AppService(
      { readyState: 0 } as any,
      { isLockServiceAvailable: jest.fn().mockReturnValue(true) } as any,
    );

    const health = service.getHealth();

    expect(health.status).toBe('degraded');
    expect(health.locks.redis).toBe('connected');
  });
});
