import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsEnum,
  IsIn,
  IsOptional,
  IsString,
  MinLength,
  ValidateNested,
} from 'class-validator';
import { LANGUAGES, Language } from '../../language/language.types';
import { IntentType } from './intent.types';

export class TriggerRuleDto {
  @IsIn(LANGUAGES)
  language!: Language;

  @IsEnum(IntentType)
  intent!: IntentType;

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  @MinLength(1, { each: true })
  patterns!: string[];

  @IsOptional()
  @IsBoolean()
  retain?: boolean;

  @IsOptional()
  @IsBoolean()
  capture?: boolean;
}

export class VolumeKeywordsDto {
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  up!: string[];

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  down!: string[];

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  mute!: string[];
}

export class LexiconDto {
  @IsIn(LANGUAGES)
  language!: Language;

  @IsArray()
  @IsString({ each: true })
  fillers!: string[];

  @IsArray()
  @IsString({ each: true })
  references!: string[];

  @IsArray()
  @IsString({ each: true })
  browserSuffixes!: string[];

  @IsArray()
  @IsString({ each: true })
  questionWords!: string[];

  @ValidateNested()
  @Type(() => VolumeKeywordsDto)
  volume!: VolumeKeywordsDto;
}

export class TriggerRulesFileDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => TriggerRuleDto)
  rules!: TriggerRuleDto[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => LexiconDto)
  lexicons!: LexiconDto[];
}

export class AppEntryDto {
  @IsString()
  @MinLength(1)
  name!: string;

  @IsString()
  @MinLength(1)
  command!: string;

  @IsString()
  @MinLength(1)
  process!: string;

  @IsOptional()
  @IsBoolean()
  browser?: boolean;

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  aliases!: string[];
}

export class WebsiteEntryDto {
  @IsString()
  @MinLength(1)
  name!: string;

  @IsString()
  @MinLength(3)
  domain!: string;

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  aliases!: string[];
}

export class EntityCatalogFileDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => AppEntryDto)
  apps!: AppEntryDto[];

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => WebsiteEntryDto)
  websites!: WebsiteEntryDto[];
}

export class VisionQuestionRuleDto {
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  keywords!: string[];

  @IsString()
  @MinLength(1)
  question!: string;
}

export class VisionQuestionsFileDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => VisionQuestionRuleDto)
  rules!: VisionQuestionRuleDto[];

  @IsString()
  answerPrefix!: string;

  @IsString()
  @MinLength(1)
  fallback!: string;
}
