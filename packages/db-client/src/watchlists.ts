import type { SupabaseClient } from '@supabase/supabase-js';
import { parseWatchlistRow } from './schemas.js';
import type { WatchlistStore } from './store.js';
import type { WatchlistCounts, WatchlistRecord } from './types.js';

const WATCHLIST_COLUMNS =
  'id,user_id,name,description,is_default,watchlist_items(position,assets(id,symbol,name,asset_type,sector,industry,is_active))';

export function createWatchlistRepository(supabase: SupabaseClient): WatchlistStore {
  return {
    async getWatchlist(watchlistId: string): Promise<WatchlistRecord | null> {
      const { data, error } = await supabase
        .from('watchlists')
        .select(WATCHLIST_COLUMNS)
        .eq('id', watchlistId)
        .maybeSingle();

      if (error) {
        throw new Error(`Failed to fetch watchlist: ${error.message}`);
      }

      return data ? parseWatchlistRow(data) : null;
    },

    async getDefaultWatchlist(userId: string): Promise<WatchlistRecord | null> {
      const { data, error } = await supabase
        .from('watchlists')
        .select(WATCHLIST_COLUMNS)
        .eq('user_id', userId)
        .order('is_default', { ascending: false })
        .order('created_at', { ascending: true })
        .limit(1)
        .maybeSingle();

      if (error) {
        throw new Error(`Failed to fetch default watchlist: ${error.message}`);
      }

      return data ? parseWatchlistRow(data) : null;
    },

    async countWatchlists(userId: string): Promise<WatchlistCounts> {
      const { data, error } = await supabase
        .from('watchlists')
        .select('id,watchlist_items(asset_id)')
        .eq('user_id', userId);

      if (error) {
        throw new Error(`Failed to count watchlists: ${error.message}`);
      }

      const rows: unknown[] = Array.isArray(data) ? data : [];
      let items = 0;
      for (const row of rows) {
        if (typeof row === 'object' && row !== null && 'watchlist_items' in row) {
          const embedded = row.watchlist_items;
          if (Array.isArray(embedded)) items += embedded.length;
        }
      }

      return { watchlists: rows.length, items };
    },
  };
}
