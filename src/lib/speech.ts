import { debug, warn } from './logging';
import { cleanWordForSpeech } from './reading';

interface RecognitionAlternative {
  readonly transcript: string;
}

interface RecognitionResult {
  readonly isFinal: boolean;
  readonly length: number;
  readonly [index: number]: RecognitionAlternative;
}

export interface RecognitionResultList {
  readonly length: number;
  readonly [index: number]: RecognitionResult;
}

interface RecognitionEvent {
  readonly results: RecognitionResultList;
}

interface RecognitionErrorEvent {
  readonly error: string;
}

interface RecognitionInstance {
  lang: string;
  continuous: boolean;
  interimResults: boolean;
  onresult: ((event: RecognitionEvent) => void) | null;
  onerror: ((event: RecognitionErrorEvent) => void) | null;
  onend: (() => void) | null;
  start(): void;
  stop(): void;
}

type RecognitionConstructor = new () => RecognitionInstance;

export interface RecognitionOutcome {
  /** The session ended on a permission or microphone error, so nothing was heard. */
  blocked: boolean;
}

export interface SpeechRecognizerHandlers {
  onTranscript: (text: string) => void;
  onFinal?: () => void;
  onEnd: (outcome: RecognitionOutcome) => void;
  onUnavailable: (reason: string) => void;
}

export interface SpeechRecognizer {
  readonly supported: boolean;
  start(): void;
  stop(): void;
}

const BLOCKING_ERRORS = new Set(['not-allowed', 'service-not-allowed', 'audio-capture']);

const isRecognitionConstructor = (value: unknown): value is RecognitionConstructor => typeof value === 'function';

const findRecognitionConstructor = (): RecognitionConstructor | null => {
  const candidate: unknown =
    Reflect.get(globalThis, 'SpeechRecognition') ?? Reflect.get(globalThis, 'webkitSpeechRecognition');
  return isRecognitionConstructor(candidate) ? candidate : null;
};

export const transcriptFromResults = (results: RecognitionResultList) => {
  const parts: string[] = [];
  for (let i = 0; i < results.length; i += 1) {
    const best = results[i]?.[0]?.transcript.trim();
    if (best) parts.push(best);
  }
  return parts.join(' ');
};

export const isFinalResult = (results: RecognitionResultList) =>
  results.length > 0 && results[results.length - 1].isFinal;

export function createSpeechRecognizer(locale: string, handlers: SpeechRecognizerHandlers): SpeechRecognizer {
  const Recognition = findRecognitionConstructor();
  if (!Recognition) {
    return {
      supported: false,
      start: () => handlers.onUnavailable('Speech recognition is not supported in this browser.'),
      stop: () => undefined
    };
  }

  let active: RecognitionInstance | null = null;

  const stop = () => {
    active?.stop();
  };

  const start = () => {
    if (active) return;
    const recognition = new Recognition();
    recognition.lang = locale;
    recognition.continuous = false;
    recognition.interimResults = true;
    let blocked = false;
    recognition.onresult = (event) => {
      handlers.onTranscript(transcriptFromResults(event.results));
      if (isFinalResult(event.results)) {
        handlers.onFinal?.();
        recognition.stop();
      }
    };
    recognition.onerror = (event) => {
      debug('speech recognition error', event.error);
      if (BLOCKING_ERRORS.has(event.error)) {
        blocked = true;
        handlers.onUnavailable('Microphone access is needed to check your reading.');
      }
      recognition.stop();
    };
    recognition.onend = () => {
      active = null;
      handlers.onEnd({ blocked });
    };
    active = recognition;
    try {
      recognition.start();
    } catch (error) {
      active = null;
      warn('speech recognition failed to start', error);
      handlers.onUnavailable('Speech recognition could not start.');
    }
  };

  return { supported: true, start, stop };
}

export interface SpeakOptions {
  locale: string;
  rate: number;
}

export function speakWord(word: string, options: SpeakOptions): boolean {
  const text = cleanWordForSpeech(word);
  if (!text) return false;
  if (typeof globalThis.speechSynthesis === 'undefined' || typeof globalThis.SpeechSynthesisUtterance === 'undefined') {
    warn('speech synthesis is not available');
    return false;
  }
  const utterance = new SpeechSynthesisUtterance(text);
  utterance.lang = options.locale;
  utterance.rate = options.rate;
  const voice = speechSynthesis.getVoices().find((candidate) => candidate.lang === options.locale);
  if (voice) utterance.voice = voice;
  speechSynthesis.cancel();
  speechSynthesis.speak(utterance);
  return true;
}
