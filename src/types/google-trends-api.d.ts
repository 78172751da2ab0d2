declare module 'google-trends-api' {
    export function realTimeTrends(options: {
        geo: string;
        category?: string;
        hl?: string;
    }): Promise<string>;

    const googleTrends: {
        realTimeTrends: typeof realTimeTrends;
    };

    export default googleTrends;
}
