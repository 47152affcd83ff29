import { loadConfig } from '@/config/env';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      env: 'development',
      port: 8000,
      databaseUrl: undefined,
      databaseName: undefined,
    });
  });

  it('reads and trims provided values, treating blanks as unset', () => {
    expect(
      loadConfig({ NODE_ENV: 'production', PORT: '3000', DATABASE_URL: ' mongodb://db:27017 ', DATABASE_NAME: '  ' }),
    ).toEqual({
      env: 'production',
      port: 3000,
      databaseUrl: 'mongodb://db:27017',
      databaseName: undefined,
    });
  });

  it('fails fast on an invalid port', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow('Invalid environment configuration: PORT');
  });
});
