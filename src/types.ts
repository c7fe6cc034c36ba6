export interface Term {
  text: string;
  notes?: string;
}

export type CommaPolicy = 'split' | 'group';

export interface TranslationResult {
  romanized: string;
  translated: string;
}

export interface Prosody {
  speakingRate: number;
  pitch: number;
  volumeGainDb: number;
}

export interface VoiceProfile {
  name: string;
  language: string;
  prosody?: Partial<Prosody>;
}

export interface ScriptGaps {
  leadInMs: number;
  repeatMs: number;
  translationMs: number;
}

export interface VoiceConfig {
  nativeA: VoiceProfile;
  nativeB: VoiceProfile;
  target: VoiceProfile;
  prosody: Prosody;
  gaps: ScriptGaps;
}

export type SegmentRole = 'native-a' | 'native-b' | 'target';

export interface VoiceSegment {
  role: SegmentRole;
  voice: string;
  language: string;
  text: string;
  prosody: Prosody;
  /** Silence between the end of the previous segment (or the start of the asset) and this one. */
  offsetMs: number;
}

export interface PronunciationScript {
  segments: VoiceSegment[];
}

export interface AudioAsset {
  filename: string;
  payload?: Buffer;
  script?: PronunciationScript;
}

export interface FlashcardRecord {
  term: Term;
  translation: TranslationResult;
  audioFile: string;
  notes: string;
}

export interface CacheEntry {
  text: string;
  romanized: string;
  translated: string;
  audioFile?: string;
  scriptKey?: string;
}

export type RunPhase = 'parsing' | 'resolving' | 'assembling' | 'writing' | 'done' | 'cancelled';
export type TermState = 'pending' | 'translating' | 'synthesizing' | 'resolved' | 'assembled' | 'failed';

export interface FailedTerm {
  text: string;
  stage: TermState;
  code: string;
  message: string;
}

export interface RunSummary {
  status: 'done' | 'cancelled';
  outputPath: string;
  processed: number;
  records: FlashcardRecord[];
  failed: FailedTerm[];
}
