export type UserRow = {
  id: string;
  telegram_id: string; // bigint comes as string in pg
  created_at: Date;
};

export type ScanReportRow = {
  id: string;
  user_id: string | null;
  wallet_address: string;
  chains: string[];
  overall_risk_score: number;
  critical_count: number;
  summary_text: string;
  csv_path: string | null;
  html_path: string | null;
  data_json: unknown;
  created_at: Date;
};

export type TokenMetadataRow = {
  chain_id: number;
  token_address: string;
  symbol: string | null;
  name: string | null;
  decimals: number | null;
  updated_at: Date;
};
