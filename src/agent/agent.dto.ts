import { IsOptional, IsString, Matches, MaxLength } from 'class-validator';

const SESSION_ID = /^[\w-]{1,64}$/;

export class AgentTurnDto {
  @IsString()
  @MaxLength(2000)
  text!: string;

  @IsOptional()
  @IsString()
  languageHint?: string;

  @IsOptional()
  @Matches(SESSION_ID)
  sessionId?: string;
}

export class AgentResolveDto {
  @IsString()
  @MaxLength(2000)
  text!: string;
}

export class AgentVoiceDto {
  @IsOptional()
  @Matches(SESSION_ID)
  sessionId?: string;
}
