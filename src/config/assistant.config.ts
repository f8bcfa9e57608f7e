import { ConfigService } from '@nestjs/config';
import {
  IsInt,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  MinLength,
} from 'class-validator';
import { validatePlain } from '../common/validate-plain';
import { Language, Localized } from '../language/language.types';

export const ASSISTANT_CONFIG = Symbol('ASSISTANT_CONFIG');

/**
 * Explicit configuration handed to the dispatcher and the adapters. Nothing
 * downstream reads `process.env`.
 */
export interface AssistantConfig {
  readonly assistantNames: Readonly<Localized>;
  readonly defaultBrowser: string;
  readonly historyCapacity: number;
  /** How many recent turns are replayed to the conversation model. */
  readonly historyWindow: number;
  readonly visionStaleAfterTurns: number;
  readonly searchMaxResults: number;
  readonly collaboratorTimeoutMs: number;
  readonly sessionTtlMs: number;
  readonly ollamaBaseUrl: string;
  readonly ollamaLlmModel: string;
  readonly ollamaVisionModel: string;
  readonly sttServerUrl: string;
  readonly ttsServerUrl: string;
  readonly cameraDevice: string;
  /** Empty means ~/Pictures. */
  readonly screenshotDir: string;
}

export const DEFAULT_ASSISTANT_CONFIG: AssistantConfig = Object.freeze({
  assistantNames: Object.freeze({
    [Language.ENGLISH]: 'Vani',
    [Language.HINDI]: 'वाणी',
    [Language.GUJARATI]: 'વાણી',
  }),
  defaultBrowser: 'firefox',
  historyCapacity: 20,
  historyWindow: 6,
  visionStaleAfterTurns: 5,
  searchMaxResults: 3,
  collaboratorTimeoutMs: 20_000,
  sessionTtlMs: 30 * 60 * 1000, // 30 minutes
  ollamaBaseUrl: 'http://127.0.0.1:11434',
  ollamaLlmModel: 'llama3.2:3b',
  ollamaVisionModel: 'moondream',
  sttServerUrl: 'http://127.0.0.1:8300',
  ttsServerUrl: 'http://127.0.0.1:8400',
  cameraDevice: '/dev/video0',
  screenshotDir: '',
});

const URL_OPTIONS = { require_tld: false, require_protocol: true };

export class EnvironmentVariables {
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsString()
  @MinLength(1)
  ASSISTANT_NAME?: string;

  @IsOptional()
  @IsString()
  @MinLength(1)
  ASSISTANT_NAME_HI?: string;

  @IsOptional()
  @IsString()
  @MinLength(1)
  ASSISTANT_NAME_GU?: string;

  @IsOptional()
  @IsString()
  @MinLength(1)
  DEFAULT_BROWSER?: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  HISTORY_CAPACITY?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  HISTORY_WINDOW?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  VISION_STALE_AFTER_TURNS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(10)
  SEARCH_MAX_RESULTS?: number;

  @IsOptional()
  @IsInt()
  @Min(100)
  COLLABORATOR_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1000)
  SESSION_TTL_MS?: number;

  @IsOptional()
  @IsUrl(URL_OPTIONS)
  OLLAMA_BASE_URL?: string;

  @IsOptional()
  @IsString()
  OLLAMA_LLM_MODEL?: string;

  @IsOptional()
  @IsString()
  OLLAMA_VISION_MODEL?: string;

  @IsOptional()
  @IsUrl(URL_OPTIONS)
  STT_SERVER_URL?: string;

  @IsOptional()
  @IsUrl(URL_OPTIONS)
  TTS_SERVER_URL?: string;

  @IsOptional()
  @IsString()
  CAMERA_DEVICE?: string;

  @IsOptional()
  @IsString()
  SCREENSHOT_DIR?: string;

  @IsOptional()
  @IsString()
  CORS_ORIGINS?: string;
}

/** `ConfigModule.forRoot({ validate })` hook: a bad environment aborts boot. */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const { value, problems } = validatePlain(EnvironmentVariables, config, {
    implicitConversion: true,
  });
  if (problems.length > 0) {
    throw new Error(`Invalid environment:\n- ${problems.join('\n- ')}`);
  }
  return value;
}

export function assistantConfigFactory(config: ConfigService): AssistantConfig {
  const defaults = DEFAULT_ASSISTANT_CONFIG;
  const string = (key: keyof EnvironmentVariables, fallback: string): string =>
    config.get<string>(key) || fallback;
  const number = (key: keyof EnvironmentVariables, fallback: number): number =>
    config.get<number>(key) ?? fallback;

  return Object.freeze({
    assistantNames: Object.freeze({
      [Language.ENGLISH]: string(
        'ASSISTANT_NAME',
        defaults.assistantNames[Language.ENGLISH],
      ),
      [Language.HINDI]: string(
        'ASSISTANT_NAME_HI',
        defaults.assistantNames[Language.HINDI],
      ),
      [Language.GUJARATI]: string(
        'ASSISTANT_NAME_GU',
        defaults.assistantNames[Language.GUJARATI],
      ),
    }),
    defaultBrowser: string('DEFAULT_BROWSER', defaults.defaultBrowser),
    historyCapacity: number('HISTORY_CAPACITY', defaults.historyCapacity),
    historyWindow: number('HISTORY_WINDOW', defaults.historyWindow),
    visionStaleAfterTurns: number(
      'VISION_STALE_AFTER_TURNS',
      defaults.visionStaleAfterTurns,
    ),
    searchMaxResults: number('SEARCH_MAX_RESULTS', defaults.searchMaxResults),
    collaboratorTimeoutMs: number(
      'COLLABORATOR_TIMEOUT_MS',
      defaults.collaboratorTimeoutMs,
    ),
    sessionTtlMs: number('SESSION_TTL_MS', defaults.sessionTtlMs),
    ollamaBaseUrl: string('OLLAMA_BASE_URL', defaults.ollamaBaseUrl),
    ollamaLlmModel: string('OLLAMA_LLM_MODEL', defaults.ollamaLlmModel),
    ollamaVisionModel: string('OLLAMA_VISION_MODEL', defaults.ollamaVisionModel),
    sttServerUrl: string('STT_SERVER_URL', defaults.sttServerUrl),
    ttsServerUrl: string('TTS_SERVER_URL', defaults.ttsServerUrl),
    cameraDevice: string('CAMERA_DEVICE', defaults.cameraDevice),
    screenshotDir: string('SCREENSHOT_DIR', defaults.screenshotDir),
  });
}
