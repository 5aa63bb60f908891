import { DEFAULT_CITIES, parseArgs, run, UsageError, USAGE } from '@/cli';

const LONDON = {
  main: { temp: 15.0, feels_like: 14.0, humidity: 80, pressure: 1012, temp_min: 13.0, temp_max: 17.0 },
  wind: { speed: 4.1 },
  weather: [{ description: 'cloudy' }],
  sys: { country: 'GB' },
};

const ok = (body: unknown) => ({ status: 200, data: JSON.stringify(body) });
const notFound = { status: 404, data: '{"cod":"404","message":"city not found"}' };

describe('parseArgs (unit)', () => {
  it('collects cities in order', () => {
    expect(parseArgs(['London', 'Paris'])).toEqual({
      cities: ['London', 'Paris'],
      save: false,
      help: false,
    });
  });

  it('reads --units in both forms and --save', () => {
    expect(parseArgs(['--units=imperial', 'Boston', '--save'])).toEqual({
      cities: ['Boston'],
      units: 'imperial',
      save: true,
      help: false,
    });
    expect(parseArgs(['--units', 'standard']).units).toBe('standard');
  });

  it('rejects unknown units and options', () => {
    expect(() => parseArgs(['--units=kelvin'])).toThrow(new UsageError('Unknown unit system: kelvin'));
    expect(() => parseArgs(['--units'])).toThrow('Unknown unit system: (missing)');
    expect(() => parseArgs(['--verbose'])).toThrow('Unknown option: --verbose');
  });
});

describe('run (unit)', () => {
  const get = jest.fn();
  const now = () => new Date('2025-03-01T09:30:15Z');
  const env = { OPENWEATHER_API_KEY: 'test-key' };

  let out: string[];
  let err: string[];
  const io = {
    stdout: (text: string) => out.push(text),
    stderr: (text: string) => err.push(text),
  };

  beforeEach(() => {
    out = [];
    err = [];
  });

  const queriedCities = () => get.mock.calls.map((call) => call[1].params.q);

  /**
   * Purpose:
   * Verifies Core behavior:
   * - cities are queried sequentially
   * - a failure does not stop the batch
   * - statistics cover only successful queries
   */
  it('reports each city and the statistics', async () => {
    get.mockResolvedValueOnce(notFound).mockResolvedValueOnce(ok(LONDON));

    const code = await run(['Atlantis', 'London'], { env, io, httpClient: { get }, now });

    expect(code).toBe(0);
    expect(queriedCities()).toEqual(['Atlantis', 'London']);
    expect(out).toHaveLength(3);
    expect(out[0]).toBe('No weather data for Atlantis: HTTP 404 - City not found. Details: city not found');
    expect(out[1].split('\n')[0]).toBe('Weather data for London, GB');
    expect(out[2]).toBe(
      [
        'Statistics',
        '  Average temperature: 15.00',
        '  Max temperature: 15.00',
        '  Min temperature: 15.00',
        '  Cities tested: 1',
        '  Successful queries: 1',
      ].join('\n')
    );
    expect(err).toEqual([]);
  });

  it('exits with 1 and no statistics when every query fails', async () => {
    get.mockResolvedValue(notFound);

    const code = await run(['Atlantis'], { env, io, httpClient: { get }, now });

    expect(code).toBe(1);
    expect(out).toEqual([
      'No weather data for Atlantis: HTTP 404 - City not found. Details: city not found',
    ]);
  });

  it('falls back to WEATHER_CITIES, then to the default batch', async () => {
    get.mockResolvedValue(ok(LONDON));

    await run([], { env: { ...env, WEATHER_CITIES: 'Oslo, Lima' }, io, httpClient: { get }, now });
    expect(queriedCities()).toEqual(['Oslo', 'Lima']);

    get.mockClear();

    await run([], { env, io, httpClient: { get }, now });
    expect(queriedCities()).toEqual(DEFAULT_CITIES);
  });

  it('passes the unit system from the command line over the environment', async () => {
    get.mockResolvedValue(ok(LONDON));

    await run(['--units=imperial', 'London'], {
      env: { ...env, WEATHER_UNITS: 'standard' },
      io,
      httpClient: { get },
      now,
    });

    expect(get.mock.calls[0][1].params.units).toBe('imperial');
    expect(out[0]).toContain('Temperature: 15°F');
  });

  /**
   * Purpose:
   * Verifies Error handling:
   * - configuration and usage errors exit with 2
   * - no request is made
   */
  it('exits with 2 when the API key is missing', async () => {
    const code = await run(['London'], { env: {}, io, httpClient: { get }, now });

    expect(code).toBe(2);
    expect(err).toEqual(['Invalid configuration: OPENWEATHER_API_KEY: OPENWEATHER_API_KEY is not set']);
    expect(get).not.toHaveBeenCalled();
  });

  it('exits with 2 when the API key secret file cannot be read', async () => {
    const code = await run(['London'], {
      env: { OPENWEATHER_API_KEY: '/run/secrets/weather-probe-missing-key' },
      io,
      httpClient: { get },
      now,
    });

    expect(code).toBe(2);
    expect(err).toEqual([
      'Invalid configuration: OPENWEATHER_API_KEY: Cannot read secret file /run/secrets/weather-probe-missing-key',
    ]);
    expect(get).not.toHaveBeenCalled();
  });

  it('exits with 2 on an unknown option', async () => {
    const code = await run(['--verbose'], { env, io, httpClient: { get }, now });

    expect(code).toBe(2);
    expect(err).toEqual([`Unknown option: --verbose\n\n${USAGE}`]);
    expect(get).not.toHaveBeenCalled();
  });

  it('prints usage for --help', async () => {
    const code = await run(['--help'], { env: {}, io, httpClient: { get }, now });

    expect(code).toBe(0);
    expect(out).toEqual([USAGE]);
  });
});
