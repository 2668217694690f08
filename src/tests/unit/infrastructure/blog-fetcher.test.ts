import Parser from 'rss-parser';
import { RssBlogFetcher, BlogFetchOptions } from '@/infrastructure/blog-fetcher';
import { BlogSource } from '@/domain/digest-config';

const mockParseURL = jest.fn();

jest.mock('rss-parser', () => {
    return jest.fn().mockImplementation(() => ({
        parseURL: mockParseURL,
    }));
});

describe('RssBlogFetcher', () => {
    const source: BlogSource = {
        name: 'Example Blog',
        rss_url: 'https://blog.example.com/feed',
        enabled: true,
    };

    const options: BlogFetchOptions = {
        lookbackHours: 24,
        postsPerBlog: 3,
        dateFallback: 'include',
        now: new Date('2026-10-19T12:00:00Z'),
    };

    beforeEach(() => {
        mockParseURL.mockReset();
    });

    it('sends the configured user agent', () => {
        new RssBlogFetcher({ userAgent: 'test-agent', timeoutMs: 5000 });

        expect(Parser).toHaveBeenCalledWith({
            timeout: 5000,
            headers: { 'User-Agent': 'test-agent' },
        });
    });

    it('keeps recent posts among the first entries of the feed', async () => {
        mockParseURL.mockResolvedValue({
            items: [
                { title: 'Recent post', link: 'https://blog.example.com/recent', isoDate: '2026-10-19T08:00:00Z' },
                { title: 'Old post', link: 'https://blog.example.com/old', isoDate: '2026-10-17T08:00:00Z' },
                { title: 'Undated post', link: 'https://blog.example.com/undated' },
                { title: 'Fourth post', link: 'https://blog.example.com/fourth', isoDate: '2026-10-19T09:00:00Z' },
            ],
        });

        const result = await new RssBlogFetcher().fetchBlog(source, options);

        expect(mockParseURL).toHaveBeenCalledWith('https://blog.example.com/feed');
        expect(result).toEqual({
            name: 'Example Blog',
            rss_url: 'https://blog.example.com/feed',
            recent_posts: [
                {
                    title: 'Recent post',
                    link: 'https://blog.example.com/recent',
                    published_at: new Date('2026-10-19T08:00:00Z'),
                },
                { title: 'Undated post', link: 'https://blog.example.com/undated', published_at: null },
            ],
        });
    });

    it('reads pubDate when isoDate is missing', async () => {
        mockParseURL.mockResolvedValue({
            items: [{ title: 'Dated post', link: 'https://blog.example.com/a', pubDate: 'Mon, 19 Oct 2026 10:00:00 GMT' }],
        });

        const result = await new RssBlogFetcher().fetchBlog(source, options);

        expect(result?.recent_posts).toEqual([
            { title: 'Dated post', link: 'https://blog.example.com/a', published_at: new Date('2026-10-19T10:00:00Z') },
        ]);
    });

    it('drops undated posts under the exclude policy', async () => {
        mockParseURL.mockResolvedValue({
            items: [{ title: 'Undated post', link: 'https://blog.example.com/undated' }],
        });

        const result = await new RssBlogFetcher().fetchBlog(source, { ...options, dateFallback: 'exclude' });

        expect(result).toBeNull();
    });

    it('returns null when nothing is recent', async () => {
        mockParseURL.mockResolvedValue({
            items: [{ title: 'Old post', link: 'https://blog.example.com/old', isoDate: '2026-10-10T08:00:00Z' }],
        });

        await expect(new RssBlogFetcher().fetchBlog(source, options)).resolves.toBeNull();
    });

    it('returns null when the feed cannot be read', async () => {
        mockParseURL.mockRejectedValue(new Error('Status code 404'));

        await expect(new RssBlogFetcher().fetchBlog(source, options)).resolves.toBeNull();
    });
});
