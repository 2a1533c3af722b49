import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { marketplaceConfig } from '../config/marketplace.config';
import { SupabaseService } from '../common/supabase.service';
import { UnauthorizedMarketplaceError } from '../common/errors/pipeline.errors';

interface MarketplaceTokenRow {
    Id: number;
    AccessToken: string;
    ExpiresAt: string | null;
    CreatedAt: string;
}

const TOKEN_CACHE_MS = 60_000;

/**
 * Supplies the marketplace access token. A token in the environment wins;
 * otherwise the newest row the OAuth flow stored in MarketplaceTokens is used.
 */
@Injectable()
export class MarketplaceTokenService {
    private readonly logger = new Logger(MarketplaceTokenService.name);
    private cached: { token: string; fetchedAt: number } | null = null;

    constructor(
        @Inject(marketplaceConfig.KEY)
        private readonly config: ConfigType<typeof marketplaceConfig>,
        private readonly supabaseService: SupabaseService,
    ) {}

    async getAccessToken(): Promise<string> {
        if (this.config.accessToken) {
            return this.config.accessToken;
        }
        if (this.cached && Date.now() - this.cached.fetchedAt < TOKEN_CACHE_MS) {
            return this.cached.token;
        }

        const { data, error } = await this.supabaseService
            .getClient()
            .from('MarketplaceTokens')
            .select('*')
            .order('CreatedAt', { ascending: false })
            .limit(1)
            .maybeSingle();

        if (error) {
            this.logger.error(`Failed to read marketplace token: ${error.message}`);
            throw new UnauthorizedMarketplaceError(`Could not read marketplace token: ${error.message}`);
        }
        const row: MarketplaceTokenRow | null = data;
        if (!row) {
            throw new UnauthorizedMarketplaceError('No marketplace access token configured or stored');
        }
        if (row.ExpiresAt && Date.parse(row.ExpiresAt) <= Date.now()) {
            this.logger.warn(`Stored marketplace token ${row.Id} expired at ${row.ExpiresAt}`);
            throw new UnauthorizedMarketplaceError('Stored marketplace access token has expired');
        }

        this.cached = { token: row.AccessToken, fetchedAt: Date.now() };
        return row.AccessToken;
    }

    /** Forget the cached token after the marketplace rejects it. */
    invalidate(): void {
        this.cached = null;
    }
}
