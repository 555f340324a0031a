import { Injectable, Logger } from '@nestjs/common';
import { NotFoundError } from '../common/errors';
import { roundToHalf } from '../common/utils/round-to-half';
import { DatabaseService } from '../database/database.service';
import {
  isGrammarCorrection,
  isPronunciationWarning,
  isSessionMode,
  isString,
  isVocabularyUpgrade,
  isWritingTaskType,
  parseList,
} from './history.guards';
import type {
  BandCriterion,
  BandTrendPoint,
  CriterionTrend,
  CriterionTrendPoint,
  DetailedWeaknesses,
  SessionAttempts,
  SessionMode,
  SessionRecord,
  SpeakingAttemptInput,
  SpeakingAttemptRecord,
  WeakAreas,
  WritingAttemptInput,
  WritingAttemptRecord,
} from './history.types';

type SessionRow = {
  id: number;
  created_at: string;
  mode: string;
  overall_band: number;
  attempt_count: number;
};

type AttemptRow = {
  id: number;
  session_id: number;
  created_at: string;
  part: number;
  topic: string;
  question_text: string;
  transcript: string;
  duration: number;
  overall_band: number;
  fluency_coherence: number;
  lexical_resource: number;
  grammatical_range: number;
  pronunciation: number;
  speech_rate: number;
  pause_ratio: number;
  pronunciation_confidence: number;
  examiner_feedback: string;
  grammar_corrections: string | null;
  vocabulary_upgrades: string | null;
  improvement_tips: string | null;
  strengths: string | null;
  pronunciation_warnings: string | null;
  reference_answer: string;
  source: string;
};

type WritingAttemptRow = {
  id: number;
  session_id: number;
  created_at: string;
  task_type: number;
  prompt_text: string;
  essay_text: string;
  word_count: number;
  overall_band: number;
  task_achievement: number;
  coherence: number;
  lexical_resource: number;
  grammatical_range: number;
  examiner_feedback: string;
  grammar_corrections: string | null;
  vocabulary_upgrades: string | null;
  paragraph_feedback: string | null;
  improvement_tips: string | null;
  strengths: string | null;
};

type CriterionRow = { created_at: string } & Record<BandCriterion, number>;

type CriterionColumn = 'fluency_coherence' | 'lexical_resource' | 'grammatical_range' | 'pronunciation';

const CRITERION_COLUMNS: Record<BandCriterion, CriterionColumn> = {
  fluencyCoherence: 'fluency_coherence',
  lexicalResource: 'lexical_resource',
  grammaticalRange: 'grammatical_range',
  pronunciation: 'pronunciation',
};

const BAND_CRITERIA: readonly BandCriterion[] = [
  'fluencyCoherence',
  'lexicalResource',
  'grammaticalRange',
  'pronunciation',
];

const CRITERION_SELECT = BAND_CRITERIA.map((key) => `${CRITERION_COLUMNS[key]} AS ${key}`).join(', ');

const WEAK_AREA_WINDOW = 20;
const TOP_ITEMS = 5;
const TREND_THRESHOLD = 0.3;

const roundTenth = (value: number): number => Math.round(value * 10) / 10;

const mean = (values: number[]): number => values.reduce((total, value) => total + value, 0) / values.length;

const topCounts = (counter: Map<string, number>): Array<[string, number]> =>
  [...counter.entries()].sort((a, b) => b[1] - a[1]).slice(0, TOP_ITEMS);

const increment = (counter: Map<string, number>, key: string) => {
  counter.set(key, (counter.get(key) ?? 0) + 1);
};

@Injectable()
export class HistoryService {
  private readonly logger = new Logger(HistoryService.name);

  constructor(private readonly database: DatabaseService) {}

  createSession(mode: SessionMode): SessionRecord {
    const result = this.database.connection
      .prepare('INSERT INTO sessions (created_at, mode) VALUES (@createdAt, @mode)')
      .run({ createdAt: new Date().toISOString(), mode });
    const id = Number(result.lastInsertRowid);
    this.logger.log(`Created ${mode} session ${id}`);
    return this.getSession(id);
  }

  getSession(id: number): SessionRecord {
    const row = this.database.connection
      .prepare<[number], SessionRow>('SELECT * FROM sessions WHERE id = ?')
      .get(id);
    if (!row) {
      throw new NotFoundError('Session', id);
    }
    return this.toSession(row);
  }

  getRecentSessions(limit = 20): SessionRecord[] {
    return this.database.connection
      .prepare<[number], SessionRow>('SELECT * FROM sessions ORDER BY id DESC LIMIT ?')
      .all(limit)
      .map((row) => this.toSession(row));
  }

  saveAttempt(record: SpeakingAttemptInput): number {
    this.getSession(record.sessionId);
    return this.database.transaction(() => {
      const result = this.database.connection
        .prepare(
          `INSERT INTO attempts (
             session_id, created_at, part, topic, question_text, transcript, duration,
             overall_band, fluency_coherence, lexical_resource, grammatical_range, pronunciation,
             speech_rate, pause_ratio, pronunciation_confidence, examiner_feedback,
             grammar_corrections, vocabulary_upgrades, improvement_tips, strengths,
             pronunciation_warnings, reference_answer, source
           ) VALUES (
             @sessionId, @createdAt, @part, @topic, @questionText, @transcript, @duration,
             @overallBand, @fluencyCoherence, @lexicalResource, @grammaticalRange, @pronunciation,
             @speechRate, @pauseRatio, @pronunciationConfidence, @examinerFeedback,
             @grammarCorrections, @vocabularyUpgrades, @improvementTips, @strengths,
             @pronunciationWarnings, @referenceAnswer, @source
           )`,
        )
        .run({
          ...record,
          createdAt: new Date().toISOString(),
          grammarCorrections: JSON.stringify(record.grammarCorrections),
          vocabularyUpgrades: JSON.stringify(record.vocabularyUpgrades),
          improvementTips: JSON.stringify(record.improvementTips),
          strengths: JSON.stringify(record.strengths),
          pronunciationWarnings: JSON.stringify(record.pronunciationWarnings),
        });
      this.updateSessionStats(record.sessionId);
      return Number(result.lastInsertRowid);
    });
  }

  saveWritingAttempt(record: WritingAttemptInput): number {
    this.getSession(record.sessionId);
    return this.database.transaction(() => {
      const result = this.database.connection
        .prepare(
          `INSERT INTO writing_attempts (
             session_id, created_at, task_type, prompt_text, essay_text, word_count, overall_band,
             task_achievement, coherence, lexical_resource, grammatical_range, examiner_feedback,
             grammar_corrections, vocabulary_upgrades, paragraph_feedback, improvement_tips, strengths
           ) VALUES (
             @sessionId, @createdAt, @taskType, @promptText, @essayText, @wordCount, @overallBand,
             @taskAchievement, @coherence, @lexicalResource, @grammaticalRange, @examinerFeedback,
             @grammarCorrections, @vocabularyUpgrades, @paragraphFeedback, @improvementTips, @strengths
           )`,
        )
        .run({
          ...record,
          createdAt: new Date().toISOString(),
          grammarCorrections: JSON.stringify(record.grammarCorrections),
          vocabularyUpgrades: JSON.stringify(record.vocabularyUpgrades),
          paragraphFeedback: JSON.stringify(record.paragraphFeedback),
          improvementTips: JSON.stringify(record.improvementTips),
          strengths: JSON.stringify(record.strengths),
        });
      this.updateSessionStats(record.sessionId);
      return Number(result.lastInsertRowid);
    });
  }

  getAttemptsForSession(sessionId: number): SessionAttempts {
    const session = this.getSession(sessionId);
    const connection = this.database.connection;
    const speaking = connection
      .prepare<[number], AttemptRow>('SELECT * FROM attempts WHERE session_id = ? ORDER BY id')
      .all(sessionId)
      .map((row) => this.toAttempt(row));
    const writing = connection
      .prepare<[number], WritingAttemptRow>('SELECT * FROM writing_attempts WHERE session_id = ? ORDER BY id')
      .all(sessionId)
      .map((row) => this.toWritingAttempt(row));
    return { session, speaking, writing };
  }

  getRecentAttempts(limit = 20): SpeakingAttemptRecord[] {
    return this.database.connection
      .prepare<[number], AttemptRow>('SELECT * FROM attempts ORDER BY id DESC LIMIT ?')
      .all(limit)
      .map((row) => this.toAttempt(row));
  }

  getBandTrend(limit = 50): BandTrendPoint[] {
    return this.database.connection
      .prepare<[number], { created_at: string; overall_band: number }>(
        'SELECT created_at, overall_band FROM attempts ORDER BY id DESC LIMIT ?',
      )
      .all(limit)
      .reverse()
      .map((row) => ({ timestamp: row.created_at, overallBand: row.overall_band }));
  }

  getCriterionTrends(limit = 50): CriterionTrendPoint[] {
    return this.selectCriteria(limit)
      .reverse()
      .map(({ created_at, ...scores }) => ({ timestamp: created_at, ...scores }));
  }

  /** Mean of each criterion over the latest attempts; empty when there are none. */
  getWeakAreas(): WeakAreas {
    const rows = this.selectCriteria(WEAK_AREA_WINDOW);
    if (!rows.length) {
      return {};
    }
    const areas: WeakAreas = {};
    for (const criterion of BAND_CRITERIA) {
      areas[criterion] = roundTenth(mean(rows.map((row) => row[criterion])));
    }
    return areas;
  }

  /**
   * Aggregates repeated mistakes and per-criterion direction over the latest
   * attempts. Direction compares the older half with the newer half.
   */
  getDetailedWeaknesses(limit = 50): DetailedWeaknesses {
    const rows = this.database.connection
      .prepare<[number], AttemptRow>('SELECT * FROM attempts ORDER BY id DESC LIMIT ?')
      .all(limit);

    const grammar = new Map<string, number>();
    const corrections = new Map<string, { original: string; corrected: string }>();
    const words = new Map<string, number>();
    const tips = new Map<string, number>();

    for (const row of rows) {
      for (const item of parseList(row.grammar_corrections, isGrammarCorrection)) {
        const original = item.original.trim();
        const corrected = item.corrected.trim();
        if (original && corrected) {
          const key = JSON.stringify([original, corrected]);
          corrections.set(key, { original, corrected });
          increment(grammar, key);
        }
      }
      for (const item of parseList(row.vocabulary_upgrades, isVocabularyUpgrade)) {
        const word = item.basic_word.trim().toLowerCase();
        if (word) {
          increment(words, word);
        }
      }
      for (const tip of parseList(row.improvement_tips, isString)) {
        if (tip.trim()) {
          increment(tips, tip.trim());
        }
      }
    }

    const chronological = [...rows].reverse();
    const criterionTrends: DetailedWeaknesses['criterionTrends'] = {};
    for (const criterion of BAND_CRITERIA) {
      const trend = this.criterionTrend(chronological.map((row) => row[CRITERION_COLUMNS[criterion]]));
      if (trend) {
        criterionTrends[criterion] = trend;
      }
    }

    return {
      grammarErrors: topCounts(grammar).map(([key, count]) => {
        const { original, corrected } = corrections.get(key) ?? { original: '', corrected: '' };
        return { original, corrected, count };
      }),
      basicWords: topCounts(words).map(([word, count]) => ({ word, count })),
      criterionTrends,
      recurringTips: topCounts(tips).map(([tip, count]) => ({ tip, count })),
    };
  }

  private criterionTrend(values: number[]): CriterionTrend | null {
    const scored = values.filter((value) => value > 0);
    if (!scored.length) {
      return null;
    }
    const avg = roundTenth(mean(scored));
    const mid = Math.floor(values.length / 2);
    if (values.length < 4 || mid === 0) {
      return { avg, direction: 'insufficient data' };
    }

    const older = values.slice(0, mid).filter((value) => value > 0);
    const newer = values.slice(mid).filter((value) => value > 0);
    if (!older.length || !newer.length) {
      return { avg, direction: 'insufficient data' };
    }

    const diff = mean(newer) - mean(older);
    if (diff > TREND_THRESHOLD) {
      return { avg, direction: 'improving' };
    }
    if (diff < -TREND_THRESHOLD) {
      return { avg, direction: 'declining' };
    }
    return { avg, direction: 'stable' };
  }

  private selectCriteria(limit: number): CriterionRow[] {
    return this.database.connection
      .prepare<[number], CriterionRow>(
        `SELECT created_at, ${CRITERION_SELECT} FROM attempts ORDER BY id DESC LIMIT ?`,
      )
      .all(limit);
  }

  private updateSessionStats(sessionId: number) {
    const stats = this.database.connection
      .prepare<{ sessionId: number }, { total: number; average: number | null }>(
        `SELECT COUNT(*) AS total, AVG(overall_band) AS average FROM (
           SELECT overall_band FROM attempts WHERE session_id = @sessionId
           UNION ALL
           SELECT overall_band FROM writing_attempts WHERE session_id = @sessionId
         )`,
      )
      .get({ sessionId });

    this.database.connection
      .prepare('UPDATE sessions SET attempt_count = @total, overall_band = @band WHERE id = @sessionId')
      .run({
        sessionId,
        total: stats?.total ?? 0,
        band: typeof stats?.average === 'number' ? roundToHalf(stats.average) : 0,
      });
  }

  private toSession(row: SessionRow): SessionRecord {
    return {
      id: row.id,
      createdAt: row.created_at,
      mode: isSessionMode(row.mode) ? row.mode : 'practice',
      overallBand: row.overall_band,
      attemptCount: row.attempt_count,
    };
  }

  private toAttempt(row: AttemptRow): SpeakingAttemptRecord {
    return {
      id: row.id,
      sessionId: row.session_id,
      createdAt: row.created_at,
      part: row.part,
      topic: row.topic,
      questionText: row.question_text,
      transcript: row.transcript,
      duration: row.duration,
      overallBand: row.overall_band,
      fluencyCoherence: row.fluency_coherence,
      lexicalResource: row.lexical_resource,
      grammaticalRange: row.grammatical_range,
      pronunciation: row.pronunciation,
      speechRate: row.speech_rate,
      pauseRatio: row.pause_ratio,
      pronunciationConfidence: row.pronunciation_confidence,
      examinerFeedback: row.examiner_feedback,
      grammarCorrections: parseList(row.grammar_corrections, isGrammarCorrection),
      vocabularyUpgrades: parseList(row.vocabulary_upgrades, isVocabularyUpgrade),
      improvementTips: parseList(row.improvement_tips, isString),
      strengths: parseList(row.strengths, isString),
      pronunciationWarnings: parseList(row.pronunciation_warnings, isPronunciationWarning),
      referenceAnswer: row.reference_answer,
      source: row.source,
    };
  }

  private toWritingAttempt(row: WritingAttemptRow): WritingAttemptRecord {
    return {
      id: row.id,
      sessionId: row.session_id,
      createdAt: row.created_at,
      taskType: isWritingTaskType(row.task_type) ? row.task_type : 2,
      promptText: row.prompt_text,
      essayText: row.essay_text,
      wordCount: row.word_count,
      overallBand: row.overall_band,
      taskAchievement: row.task_achievement,
      coherence: row.coherence,
      lexicalResource: row.lexical_resource,
      grammaticalRange: row.grammatical_range,
      examinerFeedback: row.examiner_feedback,
      grammarCorrections: parseList(row.grammar_corrections, isGrammarCorrection),
      vocabularyUpgrades: parseList(row.vocabulary_upgrades, isVocabularyUpgrade),
      paragraphFeedback: parseList(row.paragraph_feedback, isString),
      improvementTips: parseList(row.improvement_tips, isString),
      strengths: parseList(row.strengths, isString),
    };
  }
}
