import { GeoResult, NewsArticle, PropertyInput } from '../types';
import { resolveCityContext } from './cityContext';

export const MAX_PROMPT_ARTICLES = 5;

const NO_NEWS = 'Tidak ada berita relevan ditemukan.';
const NOT_MENTIONED = 'Tidak disebutkan';

// Keep in sync with AnalysisResult and normalizeAnalysis.
const RESPONSE_SCHEMA = `{
  "trust_score": [integer 0-100, skor kepercayaan investasi],
  "risk_analysis": {
    "flood": [integer 0-100, 0=aman, 100=sangat berisiko],
    "earthquake": [integer 0-100],
    "legal": [integer 0-100],
    "crime": [integer 0-100],
    "double_listing": [integer 0-100],
    "accessibility": [integer 0-100]
  },
  "market_insights": {
    "price_trend": "[naik/stabil/turun]",
    "demand_level": "[tinggi/sedang/rendah]",
    "investment_grade": "[A/B/C/D]"
  },
  "executive_summary": "[Ringkasan eksekutif 6-8 kalimat untuk investor properti, gunakan konteks berita dan lokasi spesifik]",
  "recommendations": [
    "[Rekomendasi aksi 1]",
    "[Rekomendasi aksi 2]",
    "[Rekomendasi aksi 3]",
    "[Rekomendasi aksi 4]"
  ],
  "risk_factors": [
    "[Faktor risiko utama 1]",
    "[Faktor risiko utama 2]",
    "[Faktor risiko utama 3]"
  ],
  "competitive_advantages": [
    "[Keunggulan kompetitif 1]",
    "[Keunggulan kompetitif 2]"
  ]
}`;

export function buildNewsContext(news: NewsArticle[]): string {
  const lines = news
    .slice(0, MAX_PROMPT_ARTICLES)
    .map((a) => `• ${a.title || 'Unknown'} - ${a.source}`);
  return lines.length ? lines.join('\n') : NO_NEWS;
}

export function composeAnalysisPrompt(
  property: PropertyInput,
  geo: GeoResult,
  news: NewsArticle[],
): string {
  const locationName = geo.displayName || property.address;
  const cityContext = resolveCityContext(locationName);

  return `
Anda adalah asisten analisis properti untuk kawasan Jabodetabek.

=== DATA PROPERTI ===
Alamat: ${property.address}
Lokasi Terverifikasi: ${locationName}
Koordinat: ${geo.latitude}, ${geo.longitude}
Konteks Wilayah: ${cityContext}

=== PENILAIAN RISIKO USER ===
• Risiko Banjir: ${property.floodRisk}
• Risiko Gempa: ${property.earthquakeRisk}
• Status Legal: ${property.legalStatus}
• Double Listing: ${property.doubleListing}
• Tingkat Kriminalitas: ${property.crimeLevel}

=== FASILITAS & AKSES ===
Fasilitas: ${property.facilities || NOT_MENTIONED}
Akses Transportasi: ${property.transportAccess || NOT_MENTIONED}

=== BERITA TERKINI ===
${buildNewsContext(news)}

=== INSTRUKSI ANALISIS ===
Berikan analisis komprehensif dalam format JSON yang valid (tanpa markdown):

${RESPONSE_SCHEMA}

Gunakan pengetahuan mendalam tentang pasar properti Jabodetabek, tren infrastruktur, dan analisis risiko profesional.
  `.trim();
}
