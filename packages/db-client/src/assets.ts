import type { SupabaseClient } from '@supabase/supabase-js';
import { parseAssetRow, parseAssetRows } from './schemas.js';
import type { AssetStore } from './store.js';
import type { AssetRecord } from './types.js';

const ASSET_COLUMNS = 'id,symbol,name,asset_type,sector,industry,is_active';

export function createAssetRepository(supabase: SupabaseClient): AssetStore {
  return {
    async getAsset(assetId: string): Promise<AssetRecord | null> {
      const { data, error } = await supabase
        .from('assets')
        .select(ASSET_COLUMNS)
        .eq('id', assetId)
        .maybeSingle();

      if (error) {
        throw new Error(`Failed to fetch asset: ${error.message}`);
      }

      return data ? parseAssetRow(data) : null;
    },

    async listActiveAssets(): Promise<AssetRecord[]> {
      const { data, error } = await supabase
        .from('assets')
        .select(ASSET_COLUMNS)
        .eq('is_active', true)
        .order('symbol', { ascending: true });

      if (error) {
        throw new Error(`Failed to list active assets: ${error.message}`);
      }

      return parseAssetRows(data);
    },
  };
}
