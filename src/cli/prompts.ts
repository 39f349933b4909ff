import readline from 'node:readline/promises';
import dayjs from 'dayjs';
import { PropertyInput } from '../types';

export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

export class InterruptedError extends Error {
  constructor() {
    super('Input interrupted by user.');
    this.name = 'InterruptedError';
  }
}

/** readline-backed prompter. Ctrl+C rejects the pending question. */
export function createConsolePrompter(): Prompter {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  const controller = new AbortController();
  rl.on('SIGINT', () => controller.abort());
  let closed = false;

  return {
    async ask(question: string): Promise<string> {
      try {
        return await rl.question(question, { signal: controller.signal });
      } catch (err) {
        if (controller.signal.aborted) throw new InterruptedError();
        throw err;
      }
    },
    close() {
      if (closed) return;
      closed = true;
      rl.close();
    },
  };
}

type FieldPrompt = {
  key: Exclude<keyof PropertyInput, 'address' | 'timestamp'>;
  question: string;
  fallback: string;
};

export const RISK_PROMPTS: readonly FieldPrompt[] = [
  {
    key: 'floodRisk',
    question: '🌊 Risiko Banjir [rendah/sedang/tinggi] (default: sedang): ',
    fallback: 'sedang',
  },
  {
    key: 'earthquakeRisk',
    question: '🌍 Risiko Gempa [rendah/sedang/tinggi] (default: sedang): ',
    fallback: 'sedang',
  },
  {
    key: 'legalStatus',
    question: '📜 Status Legal [lengkap/tidak lengkap] (default: lengkap): ',
    fallback: 'lengkap',
  },
  {
    key: 'doubleListing',
    question: '🔄 Double Listing [ya/tidak] (default: tidak): ',
    fallback: 'tidak',
  },
  {
    key: 'crimeLevel',
    question: '🚨 Tingkat Kriminalitas [rendah/sedang/tinggi] (default: sedang): ',
    fallback: 'sedang',
  },
];

export const EXTRA_PROMPTS: readonly FieldPrompt[] = [
  { key: 'facilities', question: '🏪 Fasilitas sekitar: ', fallback: '' },
  { key: 'transportAccess', question: '🚌 Akses transportasi: ', fallback: '' },
];

/**
 * Asks for the address and the risk/facility fields. Blank answers take the
 * field's default. Returns null when the address is blank.
 */
export async function collectPropertyInput(
  prompter: Prompter,
  now: () => Date = () => new Date(),
): Promise<PropertyInput | null> {
  console.log('\n📝 INPUT DATA PROPERTI');
  console.log('-'.repeat(30));

  const address = (
    await prompter.ask(
      "🏠 Alamat properti (contoh: 'BSD City, Tangerang Selatan'):\n> ",
    )
  ).trim();
  if (!address) return null;

  const answers: Record<FieldPrompt['key'], string> = {
    floodRisk: '',
    earthquakeRisk: '',
    legalStatus: '',
    doubleListing: '',
    crimeLevel: '',
    facilities: '',
    transportAccess: '',
  };

  console.log('\n⚠️  PENILAIAN RISIKO (tekan Enter untuk default)');
  console.log('-'.repeat(45));
  for (const field of RISK_PROMPTS) {
    answers[field.key] = (await prompter.ask(field.question)).trim() || field.fallback;
  }

  console.log('\n🏗️  INFO TAMBAHAN (opsional)');
  console.log('-'.repeat(30));
  for (const field of EXTRA_PROMPTS) {
    answers[field.key] = (await prompter.ask(field.question)).trim() || field.fallback;
  }

  return {
    address,
    ...answers,
    timestamp: dayjs(now()).format(),
  };
}
