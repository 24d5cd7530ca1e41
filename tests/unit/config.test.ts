import fs from 'fs';
import os from 'os';
import path from 'path';
import { buildConfig, envSchema, loadConfig, loadProfile } from '@/config';
import { formatDay } from '@/utils/time';

describe('config (unit)', () => {
  test('envSchema applies defaults', () => {
    const env = envSchema.parse({});

    expect(env).toEqual({
      NODE_ENV: 'production',
      START_DATE: '2023-04-28',
      END_DATE: '2025-10-28',
      OUTPUT_FILE: 'historical_news_hdfc_bank_filtered.csv',
      REQUEST_DELAY_MS: 15_000,
      MIN_REQUEST_INTERVAL_MS: 5_000,
      REQUEST_TIMEOUT_MS: 20_000,
      PROFILE_PATH: 'config/profiles/hdfc-bank.json',
      GDELT_BASE_URL: 'https://api.gdeltproject.org/api/v2/doc/doc',
    });
  });

  test('envSchema coerces numeric variables and rejects bad dates', () => {
    expect(envSchema.parse({ REQUEST_DELAY_MS: '250' }).REQUEST_DELAY_MS).toBe(250);
    expect(envSchema.safeParse({ START_DATE: '28/04/2023' }).success).toBe(false);
    expect(envSchema.safeParse({ REQUEST_DELAY_MS: '-1' }).success).toBe(false);
  });

  test('loads the bundled profile', () => {
    const profile = loadProfile('config/profiles/hdfc-bank.json');

    expect(profile.name).toBe('hdfc-bank');
    expect(profile.keywords).toHaveLength(53);
    expect(profile.keywords[0]).toBe('hdfc');
    expect(profile.companyQuery.startsWith('("HDFC Bank"')).toBe(true);
    expect(Object.isFrozen(profile)).toBe(true);
  });

  /**
   * Purpose:
   * Verifies profile validation:
   * - empty keyword list is rejected
   * - error names the file and the field
   */
  test('rejects an invalid profile', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'profile-'));
    const file = path.join(dir, 'bad.json');
    fs.writeFileSync(file, JSON.stringify({ name: 'bad', companyQuery: 'a', sectorQuery: 'b', keywords: [] }));

    try {
      expect(() => loadProfile(file)).toThrow(`Invalid search profile ${file}: keywords`);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  test('builds an immutable pipeline config', () => {
    const config = loadConfig({ START_DATE: '2024-01-01', END_DATE: '2024-01-31', REQUEST_DELAY_MS: '0' });

    expect(formatDay(config.startDate)).toBe('2024-01-01');
    expect(formatDay(config.endDate)).toBe('2024-01-31');
    expect(config.requestDelayMs).toBe(0);
    expect(config.maxRecords).toBe(250);
    expect(config.limits).toEqual({ company: 15, sector: 30 });
    expect(config.profile.name).toBe('hdfc-bank');
    expect(Object.isFrozen(config)).toBe(true);
  });

  test('rejects a start date after the end date', () => {
    const env = envSchema.parse({ START_DATE: '2024-02-01', END_DATE: '2024-01-31' });
    const profile = loadProfile('config/profiles/hdfc-bank.json');

    expect(() => buildConfig(env, profile)).toThrow(
      'START_DATE 2024-02-01 is after END_DATE 2024-01-31'
    );
  });
});
