import { SourceBlocklist } from '../../../../src/services/trending/blocklist';

describe('SourceBlocklist', () => {
    it('should add a host once', () => {
        const blocklist = new SourceBlocklist();

        expect(blocklist.add('top-hashtags.com', '403 Forbidden')).toBe(true);
        expect(blocklist.add('top-hashtags.com')).toBe(false);

        expect(blocklist.has('top-hashtags.com')).toBe(true);
        expect(blocklist.has('all-hashtag.com')).toBe(false);
        expect(blocklist.size).toBe(1);
    });

    it('should list hosts in the order they were blocked', () => {
        const blocklist = new SourceBlocklist();
        blocklist.add('b.example');
        blocklist.add('a.example');

        expect(blocklist.list()).toEqual(['b.example', 'a.example']);
    });
});
