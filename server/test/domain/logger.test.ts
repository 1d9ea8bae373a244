import { formatLogLine } from '../../src/logger.js';

const timestamp = '2025-03-01T12:00:00.000Z';

describe('formatLogLine', () => {
  it('writes key=value pairs for the console', () => {
    const line = formatLogLine('console', 'info', 'team_created', { teamId: 'teams_1', name: 'Lakeside Aquatics' }, timestamp);
    expect(line).toBe('2025-03-01T12:00:00.000Z INFO  team_created teamId=teams_1 name="Lakeside Aquatics"');
  });

  it('drops undefined values on the console', () => {
    const line = formatLogLine('console', 'warn', 'login_failed', { email: undefined, attempts: 3 }, timestamp);
    expect(line).toBe('2025-03-01T12:00:00.000Z WARN  login_failed attempts=3');
  });

  it('writes one JSON object per line', () => {
    const line = formatLogLine('json', 'error', 'request_failed', { error: new Error('boom'), path: '/api/v1/teams' }, timestamp);
    expect(JSON.parse(line)).toEqual({
      timestamp,
      level: 'error',
      event: 'request_failed',
      error: { name: 'Error', message: 'boom' },
      path: '/api/v1/teams',
    });
  });
});
