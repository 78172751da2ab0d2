import { log } from '../../utils/logger';

/**
 * Hosts that refused automated requests during this process lifetime.
 * Adding is idempotent, so concurrent discovery of the same block is harmless.
 */
export class SourceBlocklist {
    private blockedHosts: Set<string> = new Set();

    has(host: string): boolean {
        return this.blockedHosts.has(host);
    }

    add(host: string, reason?: string): boolean {
        if (this.blockedHosts.has(host)) return false;

        this.blockedHosts.add(host);
        log.info(`🚫 ${host} added to blocked sources`, { reason });
        return true;
    }

    list(): string[] {
        return [...this.blockedHosts];
    }

    get size(): number {
        return this.blockedHosts.size;
    }
}

export default SourceBlocklist;
