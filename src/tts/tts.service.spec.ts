import { DEFAULT_ASSISTANT_CONFIG } from '../config/assistant.config';
import { Language } from '../language/language.types';
import { TtsService } from './tts.service';

describe('TtsService', () => {
  const service = new TtsService(DEFAULT_ASSISTANT_CONFIG);
  let fetchMock: jest.SpiedFunction<typeof fetch>;

  beforeEach(() => {
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  it('posts the text and language', async () => {
    fetchMock.mockResolvedValue(new Response(null, { status: 204 }));

    await service.speak('Closed firefox', Language.ENGLISH);

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://127.0.0.1:8400/speak');
    expect(JSON.parse(String(init?.body))).toEqual({
      text: 'Closed firefox',
      language: 'en',
    });
  });

  it('skips blank text', async () => {
    await service.speak('  ', Language.HINDI);

    expect(fetchMock).not.toHaveBeenCalled();
  });
});
