import { createContext, useContext, useEffect, useLayoutEffect, useMemo, useRef, useState, useSyncExternalStore } from 'react';
import { summarizeCollection } from './lib/collection';
import type { AppConfig } from './lib/config';
import {
  MATH_FEEDBACK,
  NUMBER_PAD_KEYS,
  applyNumberPadKey,
  checkMathAnswer,
  generateMathProblem,
  showsBlockVisual,
  type NumberPadKey
} from './lib/math-problems';
import { answersUntilNextReward, hasRewardNotice, REWARD_INTERVAL } from './lib/progress';
import { initialReadingState, nextReading, readingButtonLabel, splitWords, validateReading } from './lib/reading';
import { rewardPhase, type RewardEngine } from './lib/reward-engine';
import { createSpeechRecognizer, speakWord, type SpeechRecognizer } from './lib/speech';
import { GRADES, type AppMode, type Card, type Grade, type ReadingContent, type ReadingMode } from './lib/types';
import { layoutWords, type WordLayout } from './lib/word-layout';
import './styles.css';

type Screen = 'play' | 'collection';

const APP_MODES: Array<{ id: AppMode; label: string }> = [
  { id: 'reading', label: 'Reading Buddy' },
  { id: 'math', label: 'Math Buddy' }
];
const READING_MODES: Array<{ id: ReadingMode; label: string }> = [
  { id: 'random', label: 'Random' },
  { id: 'story', label: 'Stories' }
];
const RARITY_LABEL: Record<Card['rarity'], string> = { common: 'Common', rare: 'Rare', epic: 'Epic' };

const EngineContext = createContext<RewardEngine | null>(null);
const ConfigContext = createContext<AppConfig | null>(null);

const useEngine = () => {
  const engine = useContext(EngineContext);
  if (!engine) throw new Error('RewardEngine is missing; render inside <App engine={...}>');
  return engine;
};

const useConfig = () => {
  const config = useContext(ConfigContext);
  if (!config) throw new Error('AppConfig is missing; render inside <App config={...}>');
  return config;
};

const useRewardState = () => {
  const engine = useEngine();
  return useSyncExternalStore(engine.subscribe, engine.getSnapshot);
};

function Segmented<T extends string>({
  label,
  options,
  value,
  onChange
}: {
  label: string;
  options: ReadonlyArray<{ id: T; label: string }>;
  value: T;
  onChange: (next: T) => void;
}) {
  return (
    <div className="segmented" role="radiogroup" aria-label={label}>
      {options.map((option) => (
        <button
          key={option.id}
          role="radio"
          aria-checked={option.id === value}
          className={option.id === value ? 'segment active' : 'segment'}
          onClick={() => onChange(option.id)}
        >
          {option.label}
        </button>
      ))}
    </div>
  );
}

const gradeOptions = GRADES.map((grade) => ({ id: grade, label: grade }));

const CardFace = ({ card, highlight = false }: { card: Card; highlight?: boolean }) => (
  <article className={`creature-card rarity-${card.rarity}${highlight ? ' highlight' : ''}`}>
    <header>
      <h3>{card.creature.name}</h3>
      <span className="rarity-tag">{RARITY_LABEL[card.rarity]}</span>
    </header>
    <p className="archetype">{card.creature.archetype}</p>
    <dl className="stats">
      <dt>Stamina</dt>
      <dd>{card.stats.stamina}</dd>
      <dt>Strength</dt>
      <dd>{card.stats.strength}</dd>
      <dt>Shield</dt>
      <dd>{card.stats.shield}</dd>
      <dt>Speed</dt>
      <dd>{card.stats.speed}</dd>
    </dl>
    {card.innatePower && (
      <p className="ability">
        <strong>{card.innatePower.name}</strong> {card.innatePower.description}
      </p>
    )}
    {card.switchAbility && (
      <p className="ability">
        <strong>{card.switchAbility.name}</strong> {card.switchAbility.description}
      </p>
    )}
  </article>
);

const RewardBar = ({ onOpenCollection }: { onOpenCollection: () => void }) => {
  const engine = useEngine();
  const state = useRewardState();
  const phase = rewardPhase(state);
  const remaining = answersUntilNextReward(state.progress);
  const filled = REWARD_INTERVAL - remaining;

  return (
    <section className="reward-bar" aria-live="polite">
      <div className="reward-meter" aria-label={`${remaining} more correct answers until the next card`}>
        <span className="reward-fill" style={{ width: `${(filled / REWARD_INTERVAL) * 100}%` }} />
      </div>
      <p className="reward-copy">
        {state.progress.pendingTokens > 0
          ? `You have ${state.progress.pendingTokens} card${state.progress.pendingTokens === 1 ? '' : 's'} to open!`
          : `${remaining} more to earn a card`}
      </p>
      <div className="reward-actions">
        <button className="primary" disabled={phase !== 'tokens_available'} onClick={() => engine.generateCard()}>
          Open a card
        </button>
        <button className="text-cta" onClick={onOpenCollection}>
          My cards ({state.collection.length})
        </button>
      </div>
    </section>
  );
};

const RewardNotice = () => {
  const engine = useEngine();
  const state = useRewardState();
  if (!hasRewardNotice(state.progress)) return null;
  return (
    <div className="reward-notice" role="status">
      <span>
        {state.progress.unacknowledgedRewards > 1
          ? `You earned ${state.progress.unacknowledgedRewards} new cards!`
          : 'You earned a new card!'}
      </span>
      <button onClick={() => engine.acknowledgeReward()}>Yay!</button>
    </div>
  );
};

const CardReveal = () => {
  const engine = useEngine();
  const { pendingCard } = useRewardState();
  if (!pendingCard) return null;
  return (
    <div className="reveal-backdrop" role="dialog" aria-modal="true" aria-label="New card">
      <div className="reveal-panel">
        <h2>A new buddy joined you!</h2>
        <CardFace card={pendingCard} highlight />
        <button className="primary" onClick={() => engine.commitPendingCard()}>
          Add to my collection
        </button>
      </div>
    </div>
  );
};

const CollectionView = ({ onBack }: { onBack: () => void }) => {
  const engine = useEngine();
  const state = useRewardState();
  const cards = engine.listCollection();
  const summary = useMemo(() => summarizeCollection(state.collection), [state.collection]);

  return (
    <section className="collection">
      <header className="collection-header">
        <button className="text-cta" onClick={onBack}>
          Back to games
        </button>
        <h2>My cards</h2>
        <p>
          {summary.total} cards · {summary.byRarity.epic} epic · {summary.byRarity.rare} rare · {summary.byRarity.common}{' '}
          common
        </p>
      </header>
      {cards.length === 0 ? (
        <p className="empty">Answer {REWARD_INTERVAL} questions correctly to earn your first card.</p>
      ) : (
        <div className="card-grid">
          {cards.map((card) => (
            <CardFace key={card.id} card={card} />
          ))}
        </div>
      )}
    </section>
  );
};

const BlockGroup = ({ count, tone }: { count: number; tone: 'left' | 'right' }) => (
  <div className={`block-group block-${tone}`}>
    {Array.from({ length: count }, (_, index) => (
      <span key={index} className="block" />
    ))}
  </div>
);

const NumberPad = ({ onTap }: { onTap: (key: NumberPadKey) => void }) => (
  <div className="number-pad">
    {NUMBER_PAD_KEYS.map((key, index) => (
      <button key={`${key}-${index}`} disabled={key === ''} onClick={() => onTap(key)}>
        {key === 'del' ? '⌫' : key}
      </button>
    ))}
  </div>
);

const MathBuddy = () => {
  const engine = useEngine();
  const [grade, setGrade] = useState<Grade>('Kindergarten');
  const [problem, setProblem] = useState(() => generateMathProblem('Kindergarten'));
  const [entry, setEntry] = useState('');
  const [feedback, setFeedback] = useState('');
  const [isCorrect, setIsCorrect] = useState(false);

  const nextProblem = (forGrade: Grade) => {
    setProblem(generateMathProblem(forGrade));
    setEntry('');
    setFeedback('');
    setIsCorrect(false);
  };

  const changeGrade = (next: Grade) => {
    setGrade(next);
    nextProblem(next);
  };

  const checkAnswer = () => {
    const result = checkMathAnswer(entry, problem);
    setFeedback(MATH_FEEDBACK[result]);
    if (result === 'invalid') return;
    setIsCorrect(result === 'correct');
    if (result === 'correct') engine.recordCorrectAnswer('math');
  };

  return (
    <section className="buddy math-buddy">
      <Segmented label="Grade" options={gradeOptions} value={grade} onChange={changeGrade} />
      <div className="visualizer">
        {showsBlockVisual(problem) && (
          <>
            <BlockGroup count={problem.left} tone="left" />
            <span className="operator">{problem.operation}</span>
            <BlockGroup count={problem.right} tone="right" />
          </>
        )}
      </div>
      <p className="question">{problem.question}</p>
      <p className="answer-slot">{entry || '?'}</p>
      <p className={`feedback ${isCorrect ? 'success' : 'info'}`} aria-live="polite">
        {feedback}
      </p>
      <NumberPad onTap={(key) => !isCorrect && setEntry((current) => applyNumberPadKey(current, key))} />
      <button className={isCorrect ? 'primary success' : 'primary'} onClick={isCorrect ? () => nextProblem(grade) : checkAnswer}>
        {isCorrect ? 'Next' : 'Check'}
      </button>
    </section>
  );
};

let measureCanvas: HTMLCanvasElement | null = null;

const measureWord = (font: string) => (word: string) => {
  if (!measureCanvas) measureCanvas = document.createElement('canvas');
  const context = measureCanvas.getContext('2d');
  if (!context) return { width: word.length * 14, height: 30 };
  context.font = font;
  return { width: Math.ceil(context.measureText(word).width), height: 30 };
};

const TappableWords = ({ sentence, onTapWord }: { sentence: string; onTapWord: (word: string) => void }) => {
  const containerRef = useRef<HTMLDivElement>(null);
  const [width, setWidth] = useState(0);
  const words = useMemo(() => splitWords(sentence), [sentence]);

  useLayoutEffect(() => {
    const node = containerRef.current;
    if (!node) return;
    const update = () => setWidth(node.clientWidth);
    update();
    const observer = new ResizeObserver(update);
    observer.observe(node);
    return () => observer.disconnect();
  }, []);

  const layout: WordLayout = useMemo(
    () => layoutWords(words, measureWord('500 24px system-ui, sans-serif'), width || 320),
    [words, width]
  );

  return (
    <div ref={containerRef} className="tappable-words" style={{ height: layout.height }}>
      {layout.words.map((placed) => (
        <button
          key={`${placed.index}-${placed.word}`}
          className="word"
          style={{ left: placed.x, top: placed.y, width: placed.width, height: placed.height }}
          onClick={() => onTapWord(placed.word)}
        >
          {placed.word}
        </button>
      ))}
    </div>
  );
};

const ReadingBuddy = ({ content }: { content: ReadingContent }) => {
  const engine = useEngine();
  const config = useConfig();
  const [grade, setGrade] = useState<Grade>('Kindergarten');
  const [mode, setMode] = useState<ReadingMode>('random');
  const [reading, setReading] = useState(() => nextReading(initialReadingState(), content.grades.Kindergarten, 'random'));
  const [transcript, setTranscript] = useState('');
  const [isRecording, setIsRecording] = useState(false);
  const [unavailable, setUnavailable] = useState<string | null>(null);
  const [supported, setSupported] = useState(true);
  const recognizerRef = useRef<SpeechRecognizer | null>(null);
  const transcriptRef = useRef('');
  const readingRef = useRef(reading);
  readingRef.current = reading;

  useEffect(() => {
    const recognizer = createSpeechRecognizer(config.speechLocale, {
      onTranscript: (text) => {
        transcriptRef.current = text;
        setTranscript(text);
      },
      onEnd: ({ blocked }) => {
        setIsRecording(false);
        if (blocked) return;
        const current = readingRef.current;
        const checked = validateReading(current, transcriptRef.current);
        setReading(checked);
        if (checked.isCorrect && !current.isCorrect) engine.recordCorrectAnswer('reading');
      },
      onUnavailable: (reason) => {
        setIsRecording(false);
        setUnavailable(reason);
      }
    });
    recognizerRef.current = recognizer;
    setSupported(recognizer.supported);
    if (!recognizer.supported) setUnavailable('Speech recognition is not supported in this browser.');
    return () => {
      recognizer.stop();
      recognizerRef.current = null;
    };
  }, [config.speechLocale, engine]);

  const advance = (nextGrade = grade, nextMode = mode) => {
    transcriptRef.current = '';
    setTranscript('');
    setReading((current) => nextReading(current, content.grades[nextGrade], nextMode));
  };

  const toggleRecording = () => {
    const recognizer = recognizerRef.current;
    if (!recognizer) return;
    if (isRecording) {
      recognizer.stop();
      return;
    }
    transcriptRef.current = '';
    setTranscript('');
    setUnavailable(null);
    setReading((current) => ({ ...current, feedback: '', isCorrect: false }));
    setIsRecording(true);
    recognizer.start();
  };

  const showMainButton = reading.isCorrect || reading.feedback !== '';

  return (
    <section className="buddy reading-buddy">
      <Segmented
        label="Mode"
        options={READING_MODES}
        value={mode}
        onChange={(next) => {
          setMode(next);
          advance(grade, next);
        }}
      />
      <Segmented
        label="Grade"
        options={gradeOptions}
        value={grade}
        onChange={(next) => {
          setGrade(next);
          advance(next, mode);
        }}
      />
      {reading.storyTitle && <p className="story-title">{reading.storyTitle}</p>}
      <TappableWords
        sentence={reading.sentence}
        onTapWord={(word) => speakWord(word, { locale: config.speechLocale, rate: config.speechRate })}
      />
      {unavailable && <p className="feedback info">{unavailable}</p>}
      {!reading.isCorrect && (
        <button
          className={isRecording ? 'primary recording' : 'primary'}
          disabled={!supported}
          onClick={toggleRecording}
        >
          {isRecording ? 'Stop Recording' : 'Start Recording'}
        </button>
      )}
      <div className="heard">
        <h3>What I heard:</h3>
        <p className="transcript">{transcript || '...'}</p>
        <p className={`feedback ${reading.isCorrect ? 'success' : 'info'}`} aria-live="polite">
          {reading.feedback}
        </p>
      </div>
      {showMainButton ? (
        <button className="primary" disabled={isRecording} onClick={() => advance()}>
          {readingButtonLabel(reading, mode)}
        </button>
      ) : (
        <div className="button-placeholder" />
      )}
    </section>
  );
};

export const StartupFailure = ({ message }: { message: string }) => (
  <main className="app-shell startup-failure">
    <h1>Something is missing</h1>
    <p>The learning content could not be loaded, so the games cannot start.</p>
    <pre>{message}</pre>
  </main>
);

export default function App({
  engine,
  config,
  reading
}: {
  engine: RewardEngine;
  config: AppConfig;
  reading: ReadingContent;
}) {
  const [mode, setMode] = useState<AppMode>('reading');
  const [screen, setScreen] = useState<Screen>('play');

  return (
    <EngineContext.Provider value={engine}>
      <ConfigContext.Provider value={config}>
        <main className="app-shell">
          <RewardNotice />
          {screen === 'collection' ? (
            <CollectionView onBack={() => setScreen('play')} />
          ) : (
            <>
              <Segmented label="App mode" options={APP_MODES} value={mode} onChange={setMode} />
              <div className={`mode-panel mode-${mode}`}>
                {mode === 'reading' ? <ReadingBuddy content={reading} /> : <MathBuddy />}
              </div>
              <RewardBar onOpenCollection={() => setScreen('collection')} />
            </>
          )}
          <CardReveal />
        </main>
      </ConfigContext.Provider>
    </EngineContext.Provider>
  );
}
