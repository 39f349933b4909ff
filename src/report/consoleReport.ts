import { APP_VERSION } from '../config';
import { AnalysisResult } from '../types';

export type LineWriter = (line: string) => void;

const defaultWriter: LineWriter = (line) => console.log(line);

export function trustVerdict(score: number): string {
  if (score >= 80) return '🟢 SANGAT DIREKOMENDASIKAN';
  if (score >= 60) return '🟡 DIREKOMENDASIKAN DENGAN CATATAN';
  return '🔴 PERLU PERTIMBANGAN MENDALAM';
}

export function riskBand(score: number): string {
  if (score <= 30) return '🟢 Rendah';
  if (score <= 60) return '🟡 Sedang';
  return '🔴 Tinggi';
}

// "double_listing" -> "Double Listing"
export function riskLabel(key: string): string {
  return key
    .split('_')
    .map((w) => (w ? w[0].toUpperCase() + w.slice(1).toLowerCase() : w))
    .join(' ');
}

function orNA(value: string): string {
  return value || 'N/A';
}

export function printWelcome(write: LineWriter = defaultWriter): void {
  write('🏢' + '='.repeat(55) + '🏢');
  write('      JABODETABEK PROPERTY INTEL - ANALISIS PROPERTI');
  write(`                 Versi ${APP_VERSION}`);
  write('='.repeat(57));
  write('📍 Wilayah: JABODETABEK (Jakarta, Bogor, Depok, Tangerang, Bekasi)');
  write('🤖 Didukung: Gemini AI + berita pasar properti terkini');
  write('='.repeat(57));
}

export function printAnalysis(
  result: AnalysisResult,
  write: LineWriter = defaultWriter,
): void {
  write('');
  write('🎯'.repeat(25));
  write('   HASIL ANALISIS PROPERTI');
  write('🎯'.repeat(25));

  write('');
  write(`🏆 TRUST SCORE: ${result.trust_score}/100`);
  write(`   Status: ${trustVerdict(result.trust_score)}`);

  write('');
  write('📊 ANALISIS RISIKO:');
  for (const [key, score] of Object.entries(result.risk_analysis)) {
    write(`   ${riskLabel(key)}: ${score}/100 ${riskBand(score)}`);
  }

  const market = result.market_insights;
  if (market.price_trend || market.demand_level || market.investment_grade) {
    write('');
    write('📈 MARKET INSIGHTS:');
    write(`   Tren Harga: ${orNA(market.price_trend).toUpperCase()}`);
    write(`   Level Demand: ${orNA(market.demand_level).toUpperCase()}`);
    write(`   Investment Grade: ${orNA(market.investment_grade)}`);
  }

  if (result.executive_summary) {
    write('');
    write('📋 RINGKASAN EKSEKUTIF:');
    write(`   ${result.executive_summary}`);
  }

  if (result.recommendations.length) {
    write('');
    write('💡 REKOMENDASI STRATEGIS:');
    result.recommendations.forEach((rec, idx) => write(`   ${idx + 1}. ${rec}`));
  }

  if (result.risk_factors.length) {
    write('');
    write('⚠️  FAKTOR RISIKO UTAMA:');
    result.risk_factors.forEach((factor) => write(`   • ${factor}`));
  }

  if (result.competitive_advantages.length) {
    write('');
    write('✨ KEUNGGULAN KOMPETITIF:');
    result.competitive_advantages.forEach((adv) => write(`   • ${adv}`));
  }
}
