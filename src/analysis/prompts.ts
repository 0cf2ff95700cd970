import type { AggregateResult } from "../types/sentiment";

export function buildPostPrompt(text: string): string {
  return `Analyze the sentiment of this market-related social media post. Follow these steps:
1. Identify key sentiment indicators
2. Consider market impact and technical factors
3. Evaluate overall sentiment
4. Provide a sentiment score from -1 (very negative) to 1 (very positive)

Text: ${text}

Provide your analysis in clear steps and end with a final line of the form "Sentiment Score: <number>".`;
}

export function buildSummaryPrompt(result: AggregateResult): string {
  const { ticker, weightedSentiment, stats, themes } = result;
  const ws = weightedSentiment.toFixed(2);

  return `Generate a market analysis for ${ticker} with these sections:

1. Overall Market Sentiment & Confidence Level
- Interpret the weighted sentiment score of ${ws}
- Judge confidence from the sample size (${stats.count} posts) and the spread of scores

2. Key Factors Driving Sentiment
- Social media activity patterns and what they imply
- Notable biases or trends in the discussion

3. Potential Price Impact
- Short-term volatility expectations and likely catalysts

4. Risk Factors
- Social sentiment risks, market structure risks, asset-specific risks

5. Short-Term Outlook (24-48 Hours)
- Baseline scenario, bullish and bearish triggers

End with a short conclusion. Use clear sections and bullet points.

Context:
- Weighted sentiment score: ${ws}
- Number of posts analyzed: ${stats.count}
- Sentiment range: ${stats.min.toFixed(2)} to ${stats.max.toFixed(2)}
- Standard deviation: ${stats.std.toFixed(2)}
- Common themes: ${themes.join(", ")}`;
}
