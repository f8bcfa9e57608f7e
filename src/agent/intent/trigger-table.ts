import { TriggerTableError } from '../../common/errors';
import { validatePlain } from '../../common/validate-plain';
import { normalizeText } from '../../language/language.normalizer';
import { LANGUAGES, Language } from '../../language/language.types';
import {
  EntityKind,
  INTENT_TYPES,
  IntentType,
  TriggerMatch,
  VolumeDirection,
} from './intent.types';
import {
  AppEntryDto,
  EntityCatalogFileDto,
  TriggerRulesFileDto,
  WebsiteEntryDto,
} from './trigger-rules.schema';
import triggerRulesJson from './trigger-rules.json';
import entityCatalogJson from './entity-catalog.json';

export const TRIGGER_TABLE = Symbol('TRIGGER_TABLE');

const BOUNDARY_BEFORE = '(?<![\\p{L}\\p{M}\\p{N}])';
const BOUNDARY_AFTER = '(?![\\p{L}\\p{M}\\p{N}])';
const DOMAIN =
  '[a-z0-9-]+(?:\\.[a-z0-9-]+)*\\.(?:com|org|net|io|in|dev|co|edu|gov)';
const BARE_DOMAIN = new RegExp(`^${DOMAIN}$`, 'u');
const PLACEHOLDER = /^\{(\w+)\}$/;
const ENTITY_KINDS: readonly EntityKind[] = ['app', 'website', 'browser'];

function isEntityKind(value: string): value is EntityKind {
  return ENTITY_KINDS.some((kind) => kind === value);
}

export interface CompiledTrigger {
  intent: IntentType;
  language: Language;
  pattern: string;
  regex: RegExp;
  retain: boolean;
  capture: boolean;
}

export interface LanguageLexicon {
  fillers: ReadonlySet<string>;
  references: readonly RegExp[];
  browserSuffixes: readonly RegExp[];
  questionWords: readonly string[];
  volume: Readonly<Record<VolumeDirection, readonly RegExp[]>>;
}

export interface AppEntry {
  name: string;
  command: string;
  process: string;
  browser: boolean;
}

export interface WebsiteEntry {
  name: string;
  domain: string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function phraseSource(phrase: string): string {
  return phrase.split(' ').map(escapeRegExp).join('\\s+');
}

/** Word-bounded regex for a literal phrase. */
export function phraseRegex(phrase: string, flags = 'u'): RegExp {
  return new RegExp(
    `${BOUNDARY_BEFORE}${phraseSource(normalizeText(phrase))}${BOUNDARY_AFTER}`,
    flags,
  );
}

/**
 * Known applications and websites with their spoken aliases in every
 * supported language. Lookups take normalized text.
 */
export class EntityCatalog {
  private readonly apps = new Map<string, AppEntry>();
  private readonly websites = new Map<string, WebsiteEntry>();
  private readonly alternations: Record<EntityKind, string>;
  private readonly scanners: Record<EntityKind, RegExp>;

  constructor(apps: AppEntryDto[], websites: WebsiteEntryDto[]) {
    for (const app of apps) {
      const entry: AppEntry = {
        name: normalizeText(app.name),
        command: app.command,
        process: app.process,
        browser: app.browser ?? false,
      };
      for (const alias of app.aliases) {
        this.apps.set(normalizeText(alias), entry);
      }
    }
    for (const site of websites) {
      const entry: WebsiteEntry = {
        name: normalizeText(site.name),
        domain: normalizeText(site.domain),
      };
      for (const alias of site.aliases) {
        this.websites.set(normalizeText(alias), entry);
      }
    }

    const browserAliases = [...this.apps.entries()]
      .filter(([, entry]) => entry.browser)
      .map(([alias]) => alias);

    this.alternations = {
      app: this.alternation([...this.apps.keys()]),
      browser: this.alternation(browserAliases),
      website: `${DOMAIN}|${this.alternation([...this.websites.keys()])}`,
    };
    this.scanners = {
      app: this.scanner('app'),
      browser: this.scanner('browser'),
      website: this.scanner('website'),
    };
  }

  /** Named capture group source for a `{kind}` placeholder. */
  groupSource(kind: EntityKind): string {
    return `(?:(?:the|a|an)\\s+)?(?<${kind}>${this.alternations[kind]})`;
  }

  /** Canonical name for an alias: app name, browser name or website domain. */
  canonical(kind: EntityKind, alias: string): string | undefined {
    const key = normalizeText(alias);
    switch (kind) {
      case 'app':
        return this.apps.get(key)?.name;
      case 'browser': {
        const app = this.apps.get(key);
        return app?.browser ? app.name : undefined;
      }
      case 'website':
        return (
          this.websites.get(key)?.domain ??
          (BARE_DOMAIN.test(key) ? key : undefined)
        );
    }
  }

  /** Earliest recognized entity of a kind within `[from, to)` of the text. */
  findFirst(
    kind: EntityKind,
    text: string,
    range: { from?: number; to?: number } = {},
  ): string | undefined {
    const from = range.from ?? 0;
    const to = range.to ?? text.length;
    const scanner = new RegExp(this.scanners[kind].source, 'gu');
    for (const match of text.matchAll(scanner)) {
      const start = match.index ?? 0;
      if (start >= to) break;
      if (start < from || start + match[0].length > to) continue;
      const found = this.canonical(kind, match[0]);
      if (found) return found;
    }
    return undefined;
  }

  app(name: string): AppEntry | undefined {
    return this.apps.get(normalizeText(name));
  }

  private alternation(aliases: string[]): string {
    return [...new Set(aliases)]
      .sort((a, b) => b.length - a.length || a.localeCompare(b))
      .map(phraseSource)
      .join('|');
  }

  private scanner(kind: EntityKind): RegExp {
    return new RegExp(
      `${BOUNDARY_BEFORE}(?:${this.alternations[kind]})${BOUNDARY_AFTER}`,
      'u',
    );
  }
}

/**
 * Compiles one trigger pattern. Literal words match on letter boundaries,
 * `*` spans one or more characters, `{app}` / `{website}` / `{browser}`
 * capture a catalog entity, and a leading `^` or trailing `$` anchors the
 * pattern to the edge of the utterance.
 */
export function compilePattern(pattern: string, catalog: EntityCatalog): RegExp {
  let body = pattern.trim();
  const anchoredStart = body.startsWith('^');
  const anchoredEnd = body.endsWith('$');
  if (anchoredStart) body = body.slice(1);
  if (anchoredEnd) body = body.slice(0, -1);

  const seen = new Set<string>();
  const parts = normalizeText(body)
    .split(' ')
    .map((token) => {
      if (token === '*') return '.+?';
      const kind = PLACEHOLDER.exec(token)?.[1];
      if (kind !== undefined && isEntityKind(kind)) {
        if (seen.has(kind)) {
          throw new TriggerTableError([
            `"${pattern}" uses {${kind}} more than once`,
          ]);
        }
        seen.add(kind);
        return catalog.groupSource(kind);
      }
      if (/[{}]/.test(token)) {
        throw new TriggerTableError([
          `"${pattern}" has an unknown placeholder "${token}"`,
        ]);
      }
      return escapeRegExp(token);
    });

  return new RegExp(
    `${anchoredStart ? '^' : BOUNDARY_BEFORE}${parts.join('\\s+')}${anchoredEnd ? '$' : BOUNDARY_AFTER}`,
    'u',
  );
}

/**
 * Read-only (language, intent) → pattern table. Built once at startup; a
 * defect in the data aborts the boot instead of surfacing per utterance.
 */
export class TriggerTable {
  constructor(
    private readonly triggers: ReadonlyMap<Language, readonly CompiledTrigger[]>,
    private readonly lexicons: ReadonlyMap<Language, LanguageLexicon>,
    readonly catalog: EntityCatalog,
  ) {}

  triggersFor(language: Language): readonly CompiledTrigger[] {
    return this.triggers.get(language) ?? [];
  }

  /**
   * Every pattern hit for the language (optionally one intent), in table
   * order. Only the first occurrence of each pattern is reported.
   */
  match(text: string, language: Language, intent?: IntentType): TriggerMatch[] {
    const matches: TriggerMatch[] = [];
    for (const trigger of this.triggersFor(language)) {
      if (intent !== undefined && trigger.intent !== intent) continue;
      const hit = trigger.regex.exec(text);
      if (!hit) continue;

      const entities: TriggerMatch['entities'] = {};
      for (const kind of ENTITY_KINDS) {
        const value = hit.groups?.[kind];
        if (value !== undefined) entities[kind] = value;
      }

      matches.push({
        intent: trigger.intent,
        pattern: trigger.pattern,
        matched: hit[0],
        index: hit.index,
        retain: trigger.retain,
        capture: trigger.capture,
        entities,
      });
    }
    return matches;
  }

  lexicon(language: Language): LanguageLexicon {
    const lexicon = this.lexicons.get(language);
    if (!lexicon) {
      throw new TriggerTableError([`no lexicon for "${language}"`]);
    }
    return lexicon;
  }
}

export function buildTriggerTable(
  rulesPlain: object,
  catalogPlain: object,
): TriggerTable {
  const rules = validatePlain(TriggerRulesFileDto, rulesPlain);
  const entities = validatePlain(EntityCatalogFileDto, catalogPlain);
  const problems = [...rules.problems, ...entities.problems];
  if (problems.length > 0) throw new TriggerTableError(problems);

  const catalog = new EntityCatalog(
    entities.value.apps,
    entities.value.websites,
  );

  const triggers = new Map<Language, CompiledTrigger[]>(
    LANGUAGES.map((language) => [language, []]),
  );
  for (const rule of rules.value.rules) {
    for (const pattern of rule.patterns) {
      triggers.get(rule.language)?.push({
        intent: rule.intent,
        language: rule.language,
        pattern,
        regex: compilePattern(pattern, catalog),
        retain: rule.retain ?? false,
        capture: rule.capture ?? false,
      });
    }
  }

  const lexicons = new Map<Language, LanguageLexicon>();
  for (const lexicon of rules.value.lexicons) {
    lexicons.set(lexicon.language, {
      fillers: new Set(lexicon.fillers.map(normalizeText)),
      references: lexicon.references.map((word) => phraseRegex(word)),
      browserSuffixes: lexicon.browserSuffixes.map((pattern) =>
        compilePattern(pattern, catalog),
      ),
      questionWords: lexicon.questionWords.map(normalizeText),
      volume: {
        up: lexicon.volume.up.map((word) => phraseRegex(word)),
        down: lexicon.volume.down.map((word) => phraseRegex(word)),
        mute: lexicon.volume.mute.map((word) => phraseRegex(word)),
      },
    });
  }

  for (const language of LANGUAGES) {
    if (!lexicons.has(language)) {
      problems.push(`missing lexicon for "${language}"`);
    }
    const covered = new Set(
      triggers.get(language)?.map((trigger) => trigger.intent),
    );
    for (const intent of INTENT_TYPES) {
      if (intent !== IntentType.CONVERSATION && !covered.has(intent)) {
        problems.push(`no "${language}" pattern for intent "${intent}"`);
      }
    }
  }
  if (problems.length > 0) throw new TriggerTableError(problems);

  return new TriggerTable(triggers, lexicons, catalog);
}

export function loadDefaultTriggerTable(): TriggerTable {
  return buildTriggerTable(triggerRulesJson, entityCatalogJson);
}
