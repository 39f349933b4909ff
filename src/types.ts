export type PropertyInput = {
  address: string;
  floodRisk: string; // rendah / sedang / tinggi
  earthquakeRisk: string;
  legalStatus: string; // lengkap / tidak lengkap
  doubleListing: string; // ya / tidak
  crimeLevel: string;
  facilities: string;
  transportAccess: string;
  timestamp: string;
};

export type GeoSource = 'nominatim' | 'fallback';

export type GeoResult = {
  displayName: string;
  latitude: number;
  longitude: number;
  addressComponents: Record<string, string>;
  source: GeoSource;
  osmId?: number | string;
  // Number of candidates returned. Higher means a more ambiguous match.
  confidence: number;
};

export type GeoContext = GeoResult & {
  cityContext: string;
  city: string;
};

export type NewsSourceKind = 'newsApi' | 'rss';

export type NewsArticle = {
  title: string;
  url: string;
  published: string;
  source: string;
  description: string;
};

export interface NewsSource {
  kind: NewsSourceKind;
  fetchArticles(city: string): Promise<NewsArticle[]>;
}

export type RiskAnalysis = Record<string, number>;

export type MarketInsights = {
  price_trend: string; // naik / stabil / turun
  demand_level: string; // tinggi / sedang / rendah
  investment_grade: string; // A-D
};

export type AnalysisResult = {
  trust_score: number; // 0–100
  risk_analysis: RiskAnalysis;
  market_insights: MarketInsights;
  executive_summary: string;
  recommendations: string[];
  risk_factors: string[];
  competitive_advantages: string[];
};

export type JsonObject = { [key: string]: unknown };

export type Report = {
  appVersion: string;
  sessionId: number;
  analysisTimestamp: string;
  propertyInput: PropertyInput;
  geolocation: GeoContext;
  newsIntelligence: {
    totalArticles: number;
    articles: NewsArticle[];
  };
  aiAnalysis: JsonObject;
  rawAiResponse: string;
  systemInfo: {
    model: string;
    userAgent: string;
  };
};
