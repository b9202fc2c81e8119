/**
 * Tests for the RSS/Atom source, fed XML in-process
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { RssFeedSource, blankInvalidDates, toFeedEntry } from '../../../src/feeds/sources/rss';

const RSS_FIXTURE = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:media="http://search.yahoo.com/mrss/" xmlns:dc="http://purl.org/dc/elements/1.1/">
  <channel>
    <title>Fixture</title>
    <link>https://news.example.com</link>
    <description>Fixture feed</description>
    <item>
      <title><![CDATA[<b>Patch</b> 1.2 &amp; more]]></title>
      <link>https://news.example.com/patch</link>
      <description><![CDATA[<p>Balance changes</p>]]></description>
      <pubDate>Wed, 10 Jan 2024 12:00:00 GMT</pubDate>
      <media:content url="https://cdn.example.com/patch.jpg" type="image/jpeg" medium="image"/>
    </item>
    <item>
      <title>Финал турнира</title>
      <link>https://news.example.com/final</link>
      <description>&lt;img src="https://cdn.example.com/inline.png"&gt; Finals tonight</description>
      <dc:date>2024-01-09T08:00:00Z</dc:date>
      <enclosure url="https://cdn.example.com/cover.png" type="image/png" length="100"/>
    </item>
    <item>
      <description>No title here</description>
    </item>
    <item>
      <title>Thumb only</title>
      <media:thumbnail url="https://cdn.example.com/thumb.jpg"/>
    </item>
  </channel>
</rss>`;

const ATOM_FIXTURE = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Atom Fixture</title>
  <id>urn:fixture</id>
  <updated>2024-02-02T00:00:00Z</updated>
  <entry>
    <title>Atom news</title>
    <link href="https://news.example.com/atom-1"/>
    <id>urn:fixture:1</id>
    <updated>2024-02-01T10:00:00Z</updated>
    <summary type="html">&lt;p&gt;Atom &amp;amp; summary&lt;/p&gt;</summary>
  </entry>
</feed>`;

const BAD_DATE_ATOM_FIXTURE = `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>Atom Fixture</title>
  <id>urn:fixture</id>
  <updated>2024-02-02T12:00:00Z</updated>
  <entry>
    <title>Good one</title>
    <link href="https://news.example.com/good"/>
    <id>urn:fixture:good</id>
    <published>2024-02-01T09:00:00Z</published>
  </entry>
  <entry>
    <title>Bad date</title>
    <link href="https://news.example.com/bad"/>
    <id>urn:fixture:bad</id>
    <published>not a date</published>
    <updated>2024-02-02T09:00:00Z</updated>
  </entry>
</feed>`;

const ENCLOSURES_FIXTURE = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Fixture</title>
    <link>https://news.example.com</link>
    <description>Fixture feed</description>
    <item>
      <title>Episode with cover</title>
      <link>https://news.example.com/episode</link>
      <pubDate>Fri, 12 Jan 2024 08:00:00 GMT</pubDate>
      <enclosure url="https://cdn.example.com/a.mp3" type="audio/mpeg" length="2048"/>
      <enclosure url="https://cdn.example.com/c.png" type="image/png" length="512"/>
    </item>
  </channel>
</rss>`;

const FIXTURE_DEFINITION = { name: 'Fixture Feed', url: 'https://news.example.com/rss', priority: 1 };

class FixtureRssSource extends RssFeedSource {
  constructor(private readonly xml: string) {
    super(FIXTURE_DEFINITION);
  }

  protected async readDocument(): Promise<string> {
    return this.xml;
  }
}

const options = { maxEntries: 10, now: new Date('2024-03-15T00:00:00Z') };

describe('RssFeedSource', () => {
  it('should map RSS 2.0 items into news items', async () => {
    const items = await new FixtureRssSource(RSS_FIXTURE).fetch(options);

    expect(items).toEqual([
      {
        title: 'Patch 1.2 & more',
        description: 'Balance changes',
        link: 'https://news.example.com/patch',
        image: 'https://cdn.example.com/patch.jpg',
        date: '2024-01-10',
        source: 'Fixture Feed',
      },
      {
        title: 'Финал турнира',
        description: 'Finals tonight',
        link: 'https://news.example.com/final',
        image: 'https://cdn.example.com/cover.png',
        date: '2024-01-09',
        source: 'Fixture Feed',
      },
      {
        title: 'Thumb only',
        description: '',
        link: '',
        image: 'https://cdn.example.com/thumb.jpg',
        date: '2024-03-15',
        source: 'Fixture Feed',
      },
    ]);
  });

  it('should map Atom entries into news items', async () => {
    const items = await new FixtureRssSource(ATOM_FIXTURE).fetch(options);

    expect(items).toEqual([
      {
        title: 'Atom news',
        description: 'Atom & summary',
        link: 'https://news.example.com/atom-1',
        image: '',
        date: '2024-02-01',
        source: 'Fixture Feed',
      },
    ]);
  });

  it('should keep entries around one with a malformed Atom date', async () => {
    const items = await new FixtureRssSource(BAD_DATE_ATOM_FIXTURE).fetch(options);

    expect(items.map(item => [item.title, item.date])).toEqual([
      ['Good one', '2024-02-01'],
      ['Bad date', '2024-02-02'],
    ]);
  });

  it('should find an image enclosure listed after an audio one', async () => {
    const items = await new FixtureRssSource(ENCLOSURES_FIXTURE).fetch(options);

    expect(items).toHaveLength(1);
    expect(items[0]?.image).toBe('https://cdn.example.com/c.png');
  });

  it('should return an empty list for a document that is not a feed', async () => {
    const items = await new FixtureRssSource('<html><body>Not a feed</body></html>').fetch(options);

    expect(items).toEqual([]);
  });

  it('should return an empty list for unparseable XML', async () => {
    const items = await new FixtureRssSource('this is not xml at all').fetch(options);

    expect(items).toEqual([]);
  });
});

describe('RssFeedSource over HTTP', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should download and parse the feed URL', async () => {
    const fetchMock = vi.fn(async () => new Response(ENCLOSURES_FIXTURE, { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const items = await new RssFeedSource(FIXTURE_DEFINITION).fetch(options);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]).toEqual([
      FIXTURE_DEFINITION.url,
      expect.objectContaining({ headers: expect.any(Object) }),
    ]);
    expect(items.map(item => item.title)).toEqual(['Episode with cover']);
  });

  it('should return an empty list on an HTTP error', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('gone', { status: 404 })));

    const items = await new RssFeedSource(FIXTURE_DEFINITION).fetch(options);

    expect(items).toEqual([]);
  });
});

describe('blankInvalidDates', () => {
  it('should empty unparseable Atom dates and keep valid ones', () => {
    const xml =
      '<entry><published>soon</published><updated type="text">2024-01-01T00:00:00Z</updated></entry>';

    expect(blankInvalidDates(xml)).toBe(
      '<entry><published></published><updated type="text">2024-01-01T00:00:00Z</updated></entry>'
    );
  });
});

describe('toFeedEntry', () => {
  it('should read media attributes and skip malformed media elements', () => {
    const entry = toFeedEntry({
      title: 'T',
      mediaContent: ['', { $: { url: 'https://cdn.example.com/m.png', type: 'image/png' } }],
      description: { _: '<p>text</p>', $: { lang: 'en' } },
    });

    expect(entry.mediaContent).toEqual([{ url: 'https://cdn.example.com/m.png', type: 'image/png' }]);
    expect(entry.description).toBe('<p>text</p>');
    expect(entry.enclosures).toBeUndefined();
  });

  it('should keep every enclosure in document order', () => {
    const entry = toFeedEntry({
      enclosure: { url: 'https://cdn.example.com/a.mp3', type: 'audio/mpeg' },
      enclosures: [
        { $: { url: 'https://cdn.example.com/a.mp3', type: 'audio/mpeg', length: '1' } },
        { $: { url: 'https://cdn.example.com/c.png', type: 'image/png', length: '1' } },
      ],
    });

    expect(entry.enclosures).toEqual([
      { url: 'https://cdn.example.com/a.mp3', type: 'audio/mpeg' },
      { url: 'https://cdn.example.com/c.png', type: 'image/png' },
    ]);
  });
});
