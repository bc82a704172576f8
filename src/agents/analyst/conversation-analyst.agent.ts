import { Injectable } from '@nestjs/common';
import { BaseAgent } from '../base.agent';
import {
  type AgentInput,
  type AgentOutput,
  type ConversationTurn,
  StageName,
} from '../agent.types';
import { round2 } from '../../common/text.util';
import lexicon from '../lexicon.json';

export type Sentiment = 'positive' | 'negative' | 'neutral' | 'mixed';
export type Level = 'low' | 'medium' | 'high';

export interface SentimentResult {
  sentiment: Sentiment;
  confidence: number;
  positiveIndicators: number;
  negativeIndicators: number;
}

export interface TopicScore {
  topic: string;
  relevance: number;
  frequency: number;
}

export interface PatternResult {
  patterns: string[];
  frequencies: Record<string, number>;
}

export interface EngagementResult {
  score: number;
  level: Level;
  metrics: {
    totalMessages: number;
    avgMessageLength: number;
    engagementIndicators: number;
    questions: number;
  };
}

export interface MemoryGap {
  topic: string;
  suggestion: string;
}

export interface Recommendation {
  type:
    | 'memory_organization'
    | 'engagement'
    | 'sentiment'
    | 'pattern'
    | 'follow_up'
    | 'profile_switch';
  priority: Level;
  message: string;
  action: string;
}

export interface ConversationInsights {
  sessionSummary: string;
  topicDistribution: Record<string, number>;
  sentimentTrends: {
    overall: Sentiment;
    confidence: number;
    indicators: { positive: number; negative: number };
  };
  engagementMetrics: EngagementResult['metrics'];
  memoryEffectiveness: { gapsIdentified: number; coverage: number };
  profileFitScore: number;
  patternSummary: string[];
}

export type ConversationAnalysis =
  | { skipped: true; reason: 'insufficient_messages' }
  | {
      skipped: false;
      sentiment: SentimentResult;
      topics: TopicScore[];
      patterns: PatternResult;
      engagement: EngagementResult;
      memoryGaps: MemoryGap[];
      insights: ConversationInsights;
      recommendations: Recommendation[];
    };

export const MIN_MESSAGES_FOR_ANALYSIS = 2;
const MAX_TOPICS = 5;
const MAX_GAPS = 5;

const stopWords = new Set(lexicon.stopWords);

function wordPattern(phrase: string): RegExp {
  return new RegExp(`\\b${phrase}\\b`, 'i');
}

const positivePatterns = lexicon.positiveWords.map(wordPattern);
const negativePatterns = lexicon.negativeWords.map(wordPattern);
const engagementPatterns = lexicon.engagementIndicators.map(wordPattern);

/** Lower-cased words of four letters or more, stop words removed. */
export function significantWords(text: string): string[] {
  return (text.toLowerCase().match(/\b[a-z]{4,}\b/g) ?? []).filter(
    (word) => !stopWords.has(word),
  );
}

function countBy(words: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const word of words) counts.set(word, (counts.get(word) ?? 0) + 1);
  return counts;
}

/**
 * Rule-based session analytics: sentiment, topics, patterns, engagement and
 * the topics the retrieved memories do not cover. Consumes no tokens.
 */
@Injectable()
export class ConversationAnalystAgent extends BaseAgent<ConversationAnalysis> {
  readonly stage = StageName.CONVERSATION_ANALYST;

  protected async execute(
    input: AgentInput,
  ): Promise<AgentOutput<ConversationAnalysis>> {
    if (input.context.history.length < MIN_MESSAGES_FOR_ANALYSIS) {
      return this.ok({ skipped: true, reason: 'insufficient_messages' });
    }

    const transcript: ConversationTurn[] = [
      ...input.context.history,
      { role: 'user', content: input.message },
      ...(input.context.reply
        ? [{ role: 'assistant' as const, content: input.context.reply }]
        : []),
    ];
    const memoryTexts = (input.context.memories ?? []).map((m) => m.text);

    const sentiment = this.analyzeSentiment(transcript);
    const topics = this.extractTopics(transcript);
    const patterns = this.detectPatterns(transcript);
    const engagement = this.calculateEngagement(transcript);
    const memoryGaps = this.identifyMemoryGaps(topics, memoryTexts);
    const coverage = round2(
      Math.min(1, Math.max(0, 1 - memoryGaps.length / Math.max(1, topics.length))),
    );

    const insights: ConversationInsights = {
      sessionSummary: `Conversation with ${transcript.length} messages. Overall sentiment: ${sentiment.sentiment}. Engagement level: ${engagement.level}.`,
      topicDistribution: Object.fromEntries(
        topics.map((t) => [t.topic, t.relevance]),
      ),
      sentimentTrends: {
        overall: sentiment.sentiment,
        confidence: sentiment.confidence,
        indicators: {
          positive: sentiment.positiveIndicators,
          negative: sentiment.negativeIndicators,
        },
      },
      engagementMetrics: engagement.metrics,
      memoryEffectiveness: { gapsIdentified: memoryGaps.length, coverage },
      profileFitScore: topics.length > 0 ? coverage : 1,
      patternSummary: patterns.patterns,
    };

    const recommendations = this.recommend({
      sentiment,
      topics,
      patterns,
      engagement,
      memoryGaps,
      insights,
      hasMemories: memoryTexts.length > 0,
      profileId: input.profileId,
    });

    this.logger.log(
      `[${input.sessionId}] Analysis: ${topics.length} topics, sentiment=${sentiment.sentiment}, engagement=${engagement.level}`,
    );

    return this.ok({
      skipped: false,
      sentiment,
      topics,
      patterns,
      engagement,
      memoryGaps,
      insights,
      recommendations,
    });
  }

  analyzeSentiment(messages: ConversationTurn[]): SentimentResult {
    const text = messages.map((m) => m.content).join(' ');
    const positive = positivePatterns.filter((p) => p.test(text)).length;
    const negative = negativePatterns.filter((p) => p.test(text)).length;
    const perMessage = (count: number) =>
      round2(Math.min(1, count / Math.max(1, messages.length)));

    let sentiment: Sentiment = 'neutral';
    let confidence = 0.5;
    if (positive > negative) {
      sentiment = 'positive';
      confidence = perMessage(positive);
    } else if (negative > positive) {
      sentiment = 'negative';
      confidence = perMessage(negative);
    } else if (positive > 0) {
      sentiment = 'mixed';
    }

    return {
      sentiment,
      confidence,
      positiveIndicators: positive,
      negativeIndicators: negative,
    };
  }

  extractTopics(messages: ConversationTurn[]): TopicScore[] {
    const counts = countBy(
      significantWords(messages.map((m) => m.content).join(' ')),
    );
    return [...counts.entries()]
      .sort((a, b) => b[1] - a[1])
      .map(([topic, frequency]) => ({
        topic,
        frequency,
        relevance: round2(Math.min(1, frequency / Math.max(1, messages.length))),
      }))
      .filter((t) => t.relevance >= 0.1)
      .slice(0, MAX_TOPICS);
  }

  detectPatterns(messages: ConversationTurn[]): PatternResult {
    const userMessages = messages
      .filter((m) => m.role === 'user')
      .map((m) => m.content);
    const patterns: string[] = [];
    const frequencies: Record<string, number> = {};

    const questions = userMessages.filter((m) => m.includes('?')).length;
    if (questions >= 2) {
      patterns.push('frequent_questions');
      frequencies['frequent_questions'] = questions;
    }

    const repeated = [
      ...countBy(significantWords(userMessages.join(' '))).values(),
    ].filter((count) => count >= 3).length;
    if (repeated > 0) {
      patterns.push('recurring_topics');
      frequencies['recurring_topics'] = repeated;
    }

    const engaged = userMessages.filter((m) =>
      engagementPatterns.some((p) => p.test(m)),
    ).length;
    if (engaged >= 2) {
      patterns.push('high_engagement');
      frequencies['high_engagement'] = engaged;
    }

    return { patterns, frequencies };
  }

  calculateEngagement(messages: ConversationTurn[]): EngagementResult {
    const userMessages = messages
      .filter((m) => m.role === 'user')
      .map((m) => m.content);
    const total = userMessages.length;
    const avgLength =
      userMessages.reduce((sum, m) => sum + m.length, 0) / Math.max(1, total);
    const indicators = userMessages.filter((m) =>
      engagementPatterns.some((p) => p.test(m)),
    ).length;
    const questions = userMessages.filter((m) => m.includes('?')).length;

    const score = round2(
      Math.min(1, avgLength / 100) * 0.3 +
        Math.min(1, indicators / Math.max(1, total)) * 0.4 +
        Math.min(1, questions / Math.max(1, total)) * 0.3,
    );

    return {
      score,
      level: score >= 0.7 ? 'high' : score >= 0.4 ? 'medium' : 'low',
      metrics: {
        totalMessages: total,
        avgMessageLength: Math.round(avgLength * 10) / 10,
        engagementIndicators: indicators,
        questions,
      },
    };
  }

  identifyMemoryGaps(topics: TopicScore[], memoryTexts: string[]): MemoryGap[] {
    const covered = new Set(significantWords(memoryTexts.join(' ')));
    return topics
      .filter((t) => !covered.has(t.topic))
      .slice(0, MAX_GAPS)
      .map((t) => ({
        topic: t.topic,
        suggestion: `Consider storing information about ${t.topic}`,
      }));
  }

  private recommend(analysis: {
    sentiment: SentimentResult;
    topics: TopicScore[];
    patterns: PatternResult;
    engagement: EngagementResult;
    memoryGaps: MemoryGap[];
    insights: ConversationInsights;
    hasMemories: boolean;
    profileId: string | null;
  }): Recommendation[] {
    const { sentiment, topics, patterns, engagement, memoryGaps, insights } =
      analysis;
    const recommendations: Recommendation[] = [];

    if (memoryGaps.length > 0) {
      recommendations.push({
        type: 'memory_organization',
        priority: 'medium',
        message: `Consider storing information about ${memoryGaps.length} topics: ${memoryGaps
          .slice(0, 3)
          .map((g) => g.topic)
          .join(', ')}`,
        action: 'review_memory_gaps',
      });
    }
    if (engagement.level === 'low') {
      recommendations.push({
        type: 'engagement',
        priority: 'high',
        message: 'User engagement is low. Consider asking more engaging questions.',
        action: 'increase_engagement',
      });
    }
    if (sentiment.sentiment === 'negative') {
      recommendations.push({
        type: 'sentiment',
        priority: 'high',
        message: 'Negative sentiment detected. Consider adjusting approach.',
        action: 'address_concerns',
      });
    }
    if (patterns.patterns.includes('recurring_topics')) {
      recommendations.push({
        type: 'pattern',
        priority: 'medium',
        message: 'Recurring topics detected. User may have strong interest in these areas.',
        action: 'explore_topics',
      });
    }
    if (topics.length > 0) {
      recommendations.push({
        type: 'follow_up',
        priority: 'low',
        message: `Consider asking follow-up questions about ${topics[0].topic}`,
        action: 'suggest_questions',
      });
    }
    if (
      analysis.hasMemories &&
      topics.length >= 3 &&
      insights.profileFitScore < 0.3
    ) {
      recommendations.push({
        type: 'profile_switch',
        priority: 'low',
        message: `Profile "${analysis.profileId ?? 'default'}" covers few of the current topics. Another memory profile may fit better.`,
        action: 'switch_profile',
      });
    }

    return recommendations;
  }
}
