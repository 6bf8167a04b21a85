// Runtime configuration for the LBO engine, read from the environment.

export type LboConfig = {
  trace: boolean;
  irrMaxIterations: number;
  irrTolerance: number;
  irrGuess: number;
  defaultProjectionYears: number;
  maxProjectionYears: number;
};

const DEFAULTS: LboConfig = {
  trace: false,
  irrMaxIterations: 100,
  irrTolerance: 1e-12,
  irrGuess: 0.1,
  defaultProjectionYears: 5,
  maxProjectionYears: 50,
};

const readNumber = (env: NodeJS.Dict<string>, key: string, fallback: number) => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const readPositiveInt = (env: NodeJS.Dict<string>, key: string, fallback: number) => {
  const value = readNumber(env, key, fallback);
  return Number.isInteger(value) && value > 0 ? value : fallback;
};

export function getLboConfig(env: NodeJS.Dict<string> = process.env): LboConfig {
  const trace = (env.LBO_TRACE || '').toLowerCase();
  const tolerance = readNumber(env, 'LBO_IRR_TOLERANCE', DEFAULTS.irrTolerance);
  const guess = readNumber(env, 'LBO_IRR_GUESS', DEFAULTS.irrGuess);

  return {
    trace: trace === '1' || trace === 'true',
    irrMaxIterations: readPositiveInt(env, 'LBO_IRR_MAX_ITERATIONS', DEFAULTS.irrMaxIterations),
    irrTolerance: tolerance > 0 ? tolerance : DEFAULTS.irrTolerance,
    irrGuess: guess > -1 ? guess : DEFAULTS.irrGuess,
    defaultProjectionYears: readPositiveInt(
      env,
      'LBO_DEFAULT_PROJECTION_YEARS',
      DEFAULTS.defaultProjectionYears
    ),
    maxProjectionYears: readPositiveInt(env, 'LBO_MAX_PROJECTION_YEARS', DEFAULTS.maxProjectionYears),
  };
}
