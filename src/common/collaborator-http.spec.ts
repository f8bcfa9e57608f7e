import { IsString } from 'class-validator';
import { callCollaborator, readJson } from './collaborator-http';
import {
  CollaboratorTimeoutError,
  CollaboratorUnavailableError,
  TurnCancelledError,
} from './errors';

class GreetingDto {
  @IsString()
  greeting!: string;
}

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });

describe('callCollaborator', () => {
  let fetchMock: jest.SpiedFunction<typeof fetch>;

  beforeEach(() => {
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  it('returns a successful response', async () => {
    fetchMock.mockResolvedValue(json({ greeting: 'hello' }));

    const res = await callCollaborator(
      'web-search',
      'http://search.test/q',
      { method: 'GET' },
      { timeoutMs: 1000 },
    );

    expect(res.status).toBe(200);
    expect(fetchMock).toHaveBeenCalledWith(
      'http://search.test/q',
      expect.objectContaining({ method: 'GET', signal: expect.any(AbortSignal) }),
    );
  });

  it('turns an error status into an unavailable collaborator', async () => {
    fetchMock.mockResolvedValue(new Response('model not loaded', { status: 500 }));

    const error = await callCollaborator(
      'conversation-model',
      'http://ollama.test/api/generate',
      {},
      { timeoutMs: 1000 },
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CollaboratorUnavailableError);
    expect(error instanceof Error && error.cause).toEqual(
      new Error('HTTP 500: model not loaded'),
    );
  });

  it('passes through accepted statuses', async () => {
    fetchMock.mockResolvedValue(new Response('', { status: 404 }));

    const res = await callCollaborator(
      'knowledge-lookup',
      'http://wiki.test/missing',
      {},
      { timeoutMs: 1000 },
      [404],
    );

    expect(res.status).toBe(404);
  });

  it('maps network failures', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    await expect(
      callCollaborator('speech-synthesis', 'http://tts.test', {}, { timeoutMs: 1000 }),
    ).rejects.toThrow(CollaboratorUnavailableError);
  });

  it('maps timeouts', async () => {
    fetchMock.mockRejectedValue(
      Object.assign(new Error('The operation was aborted due to timeout'), {
        name: 'TimeoutError',
      }),
    );

    await expect(
      callCollaborator('web-search', 'http://search.test', {}, { timeoutMs: 250 }),
    ).rejects.toThrow('web-search timed out after 250ms');
  });

  it('maps a caller abort to a cancelled turn', async () => {
    const controller = new AbortController();
    controller.abort();
    fetchMock.mockRejectedValue(
      Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }),
    );

    const error = await callCollaborator(
      'web-search',
      'http://search.test',
      {},
      { timeoutMs: 1000, signal: controller.signal },
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TurnCancelledError);
    expect(error).not.toBeInstanceOf(CollaboratorTimeoutError);
  });
});

describe('readJson', () => {
  it('returns a validated DTO', async () => {
    const body = await readJson('web-search', json({ greeting: 'hello' }), GreetingDto);

    expect(body).toBeInstanceOf(GreetingDto);
    expect(body.greeting).toBe('hello');
  });

  it.each([
    ['malformed JSON', new Response('{not json')],
    ['a non-object body', json(['hello'])],
    ['a body missing fields', json({ greeting: 42 })],
  ])('rejects %s', async (_, res) => {
    await expect(readJson('web-search', res, GreetingDto)).rejects.toThrow(
      CollaboratorUnavailableError,
    );
  });
});
