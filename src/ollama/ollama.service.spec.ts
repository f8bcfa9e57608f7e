import { CollaboratorUnavailableError } from '../common/errors';
import { DEFAULT_ASSISTANT_CONFIG } from '../config/assistant.config';
import { OllamaService } from './ollama.service';

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });

describe('OllamaService', () => {
  const service = new OllamaService({
    ...DEFAULT_ASSISTANT_CONFIG,
    ollamaBaseUrl: 'http://ollama.test:11434/',
  });
  let fetchMock: jest.SpiedFunction<typeof fetch>;

  beforeEach(() => {
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  it('sends a non-streaming generate request for the text model', async () => {
    fetchMock.mockResolvedValue(json({ model: 'llama3.2:3b', response: 'Hi!', done: true }));

    const answer = await service.generate(
      { model: 'text', prompt: 'User: hello\nAssistant: ', system: 'Be brief.' },
      'conversation-model',
    );

    expect(answer).toBe('Hi!');
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://ollama.test:11434/api/generate');
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'llama3.2:3b',
      prompt: 'User: hello\nAssistant: ',
      system: 'Be brief.',
      stream: false,
    });
  });

  it('uses the vision model for images', async () => {
    fetchMock.mockResolvedValue(json({ response: 'A mug.' }));

    await service.generate(
      { model: 'vision', prompt: 'Describe.', images: ['aW1n'] },
      'vision-model',
    );

    const [, init] = fetchMock.mock.calls[0];
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'moondream',
      prompt: 'Describe.',
      images: ['aW1n'],
      stream: false,
    });
  });

  it('reports the calling collaborator on failure', async () => {
    fetchMock.mockResolvedValue(json({ error: 'model not found' }, 404));

    await expect(
      service.generate({ model: 'vision', prompt: 'Describe.' }, 'vision-model'),
    ).rejects.toThrow(new CollaboratorUnavailableError('vision-model'));
  });
});
