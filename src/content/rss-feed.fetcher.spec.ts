import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { SourceFetchError } from '../common/errors';
import { parseFeedXml, RssFeedFetcher } from './rss-feed.fetcher';

const RSS_FEED = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:media="http://search.yahoo.com/mrss/" xmlns:dc="http://purl.org/dc/elements/1.1/">
  <channel>
    <title>Example News</title>
    <item>
      <title>Harbour reopens</title>
      <link>https://news.example.com/harbour</link>
      <guid>https://news.example.com/harbour#1</guid>
      <dc:creator>Jane Doe</dc:creator>
      <pubDate>Thu, 01 Oct 2026 08:00:00 GMT</pubDate>
      <description>&lt;p&gt;Ships are back.&lt;/p&gt;</description>
      <media:content url="https://cdn.example.com/harbour.jpg" medium="image" width="1024" height="683"/>
    </item>
    <item>
      <title>Second story</title>
      <link>https://news.example.com/second</link>
      <description><![CDATA[<p>Text <img src="https://cdn.example.com/inline.png"></p>]]></description>
      <enclosure url="https://cdn.example.com/clip.mp4" type="video/mp4" length="100"/>
    </item>
  </channel>
</rss>`;

const ATOM_FEED = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Atom Example</title>
  <entry>
    <id>urn:uuid:1</id>
    <title>Atom entry</title>
    <link rel="alternate" href="https://blog.example.org/post"/>
    <link rel="enclosure" type="image/png" href="https://blog.example.org/cover.png"/>
    <author><name>Sam</name></author>
    <updated>2026-10-02T09:30:00Z</updated>
    <summary>Plain summary</summary>
  </entry>
</feed>`;

describe('RssFeedFetcher', () => {
  let fetcher: RssFeedFetcher;
  let fetchMock: jest.Mock;

  const source = { kind: 'rss' as const, url: 'https://feeds.example.com/rss' };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RssFeedFetcher,
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((_key: string, fallback?: unknown) => fallback),
          },
        },
      ],
    }).compile();

    fetcher = module.get<RssFeedFetcher>(RssFeedFetcher);
    fetchMock = jest.fn();
    global.fetch = fetchMock as unknown as typeof fetch;
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('parseFeedXml', () => {
    it('should parse RSS items with namespaced fields and media', () => {
      const [first, second] = parseFeedXml(RSS_FEED);

      expect(first).toEqual({
        guid: 'https://news.example.com/harbour#1',
        link: 'https://news.example.com/harbour',
        title: 'Harbour reopens',
        author: 'Jane Doe',
        html: '<p>Ships are back.</p>',
        published: 'Thu, 01 Oct 2026 08:00:00 GMT',
        feedTitle: 'Example News',
        media: [
          {
            url: 'https://cdn.example.com/harbour.jpg',
            medium: 'image',
            width: 1024,
            height: 683,
          },
        ],
      });

      expect(second.guid).toBe('');
      expect(second.html).toBe(
        '<p>Text <img src="https://cdn.example.com/inline.png"></p>',
      );
      expect(second.media).toEqual([
        { url: 'https://cdn.example.com/clip.mp4', type: 'video/mp4' },
        { url: 'https://cdn.example.com/inline.png', medium: 'image' },
      ]);
    });

    it('should parse Atom entries', () => {
      expect(parseFeedXml(ATOM_FEED)).toEqual([
        {
          guid: 'urn:uuid:1',
          link: 'https://blog.example.org/post',
          title: 'Atom entry',
          author: 'Sam',
          html: 'Plain summary',
          published: '2026-10-02T09:30:00Z',
          feedTitle: 'Atom Example',
          media: [
            { url: 'https://blog.example.org/cover.png', type: 'image/png' },
          ],
        },
      ]);
    });
  });

  describe('fetch', () => {
    it('should return at most maxItems entries', async () => {
      fetchMock.mockResolvedValue({
        ok: true,
        status: 200,
        text: jest.fn().mockResolvedValue(RSS_FEED),
      });

      const items = await fetcher.fetch(source, 1);

      expect(items).toHaveLength(1);
      expect(items[0].title).toBe('Harbour reopens');
      expect(fetchMock).toHaveBeenCalledWith(
        'https://feeds.example.com/rss',
        expect.objectContaining({ signal: expect.any(AbortSignal) }),
      );
    });

    it('should reject a non-2xx response', async () => {
      fetchMock.mockResolvedValue({ ok: false, status: 404 });

      const promise = fetcher.fetch(source, 2);

      await expect(promise).rejects.toBeInstanceOf(SourceFetchError);
      await expect(promise).rejects.toThrow(
        'https://feeds.example.com/rss: HTTP 404',
      );
    });

    it('should reject a body that is not a feed', async () => {
      fetchMock.mockResolvedValue({
        ok: true,
        status: 200,
        text: jest.fn().mockResolvedValue('<html><body>Hi</body></html>'),
      });

      await expect(fetcher.fetch(source, 2)).rejects.toThrow(
        'https://feeds.example.com/rss: response is not RSS or Atom XML',
      );
    });

    it('should report a timeout', async () => {
      const timeout = new Error('The operation was aborted due to timeout');
      timeout.name = 'TimeoutError';
      fetchMock.mockRejectedValue(timeout);

      await expect(fetcher.fetch(source, 2)).rejects.toThrow(
        'https://feeds.example.com/rss: timed out after 15000ms',
      );
    });
  });
});
