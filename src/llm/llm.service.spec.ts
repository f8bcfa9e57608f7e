import { Test } from '@nestjs/testing';
import { ASSISTANT_CONFIG, DEFAULT_ASSISTANT_CONFIG } from '../config/assistant.config';
import { OllamaService } from '../ollama/ollama.service';
import { buildChatPrompt, LlmService } from './llm.service';

describe('buildChatPrompt', () => {
  it('labels the history and leaves the assistant turn open', () => {
    expect(
      buildChatPrompt(
        [
          { role: 'user', content: 'hi' },
          { role: 'assistant', content: 'hello' },
        ],
        'tell me a joke',
      ),
    ).toBe('User: hi\nAssistant: hello\nUser: tell me a joke\nAssistant: ');
  });
});

describe('LlmService', () => {
  let service: LlmService;
  let ollama: OllamaService;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        { provide: ASSISTANT_CONFIG, useValue: DEFAULT_ASSISTANT_CONFIG },
        OllamaService,
        LlmService,
      ],
    }).compile();

    service = moduleRef.get(LlmService);
    ollama = moduleRef.get(OllamaService);
  });

  it('asks the text model and trims the answer', async () => {
    const generate = jest
      .spyOn(ollama, 'generate')
      .mockResolvedValue('  Why did the chicken cross the road?\n');

    const answer = await service.reply({
      system: 'You are Vani.',
      history: [],
      prompt: 'tell me a joke',
    });

    expect(answer).toBe('Why did the chicken cross the road?');
    expect(generate).toHaveBeenCalledWith(
      { model: 'text', system: 'You are Vani.', prompt: 'User: tell me a joke\nAssistant: ' },
      'conversation-model',
      undefined,
    );
  });
});
