import { CollaboratorUnavailableError } from '../common/errors';
import { DEFAULT_ASSISTANT_CONFIG } from '../config/assistant.config';
import { collectSnippets, WebSearchService } from './web-search.service';

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });

describe('collectSnippets', () => {
  it('orders abstract, definition and topics without duplicates', () => {
    expect(
      collectSnippets({
        AbstractText: ' Mars is the fourth planet. ',
        Definition: '',
        RelatedTopics: [
          { Text: 'Mars rover' },
          { Topics: [{ Text: 'Mars rover' }, { Text: 'Phobos, a moon of Mars' }] },
        ],
      }),
    ).toEqual(['Mars is the fourth planet.', 'Mars rover', 'Phobos, a moon of Mars']);
  });

  it('returns nothing for an empty answer', () => {
    expect(collectSnippets({})).toEqual([]);
  });
});

describe('WebSearchService', () => {
  const service = new WebSearchService(DEFAULT_ASSISTANT_CONFIG);
  let fetchMock: jest.SpiedFunction<typeof fetch>;

  beforeEach(() => {
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
  });

  it('queries the instant answer API and caps the results', async () => {
    fetchMock.mockResolvedValue(
      json({
        AbstractText: 'Mars is the fourth planet.',
        RelatedTopics: [{ Text: 'Mars rover' }, { Text: 'Phobos' }],
      }),
    );

    await expect(service.search('mars rover', 2)).resolves.toEqual([
      'Mars is the fourth planet.',
      'Mars rover',
    ]);
    expect(fetchMock).toHaveBeenCalledWith(
      'https://api.duckduckgo.com/?q=mars+rover&format=json&no_html=1&skip_disambig=1',
      expect.anything(),
    );
  });

  it('rejects a malformed answer', async () => {
    fetchMock.mockResolvedValue(json({ AbstractText: 7 }));

    await expect(service.search('mars', 3)).rejects.toThrow(
      CollaboratorUnavailableError,
    );
  });
});
