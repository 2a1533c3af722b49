import { Injectable, Logger, InternalServerErrorException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { errorMessage, errorStack } from './errors/pipeline.errors';

@Injectable()
export class SupabaseService {
  private readonly logger = new Logger(SupabaseService.name);
  private client?: SupabaseClient;
  private initializationPromise: Promise<void> | null = null;

  constructor(private readonly configService: ConfigService) {}

  /**
   * Builds the catalog client once. The pipeline runs without a user session,
   * so the service-role key is preferred and the anon key is only a fallback.
   */
  async initialize(): Promise<void> {
    if (this.initializationPromise) {
      return this.initializationPromise;
    }

    this.initializationPromise = (async () => {
      const supabaseUrl = this.configService.get<string>('SUPABASE_URL');
      const serviceKey = this.configService.get<string>('SUPABASE_SERVICE_ROLE_KEY');
      const anonKey = this.configService.get<string>('SUPABASE_ANON_KEY');
      const key = serviceKey || anonKey;

      if (!supabaseUrl || !key) {
        this.logger.error('SUPABASE_URL or a Supabase key is missing in config! Catalog client NOT initialized.');
        throw new InternalServerErrorException('Supabase config missing for client initialization.');
      }
      if (!serviceKey) {
        this.logger.warn('SUPABASE_SERVICE_ROLE_KEY missing. Falling back to the anon key; catalog writes may be blocked by RLS.');
      }

      try {
        this.client = createClient(supabaseUrl, key, {
          auth: { persistSession: false, autoRefreshToken: false },
        });
        this.logger.log('Supabase catalog client initialized.');
      } catch (error) {
        this.logger.error(`Failed to initialize Supabase client: ${errorMessage(error)}`, errorStack(error));
        throw new InternalServerErrorException(`Failed to initialize Supabase client: ${errorMessage(error)}`);
      }
    })();

    return this.initializationPromise;
  }

  getClient(): SupabaseClient {
    if (!this.client) {
      this.logger.error('Attempted to get Supabase client before initialization completed.');
      throw new InternalServerErrorException('Supabase client is not available. Initialization might have failed or is not complete.');
    }
    return this.client;
  }
}
