import {
  Bar,
  BarChart,
  CartesianGrid,
  Cell,
  ResponsiveContainer,
  Tooltip,
  XAxis,
  YAxis,
} from 'recharts';
import type { AnalysisReport, TrendSummary } from '../../shared/api.js';
import { keywordWidths, mentionBars, polarityPercent, sentimentBars } from '../lib/chartData.js';

const SENTIMENT_COLORS = { Negative: '#e5484d', Neutral: '#8b8d98', Positive: '#30a46c' } as const;

function SentimentCard({ report }: { report: AnalysisReport }) {
  const { sentiment } = report;
  return (
    <div className="result-card">
      <h3>💬 Sentiment: {sentiment.label}</h3>
      <div className="gauge">
        <div className="gauge-marker" style={{ left: `${polarityPercent(sentiment.polarity)}%` }} />
      </div>
      <div className="gauge-legend">
        <span>Polarity {sentiment.polarity.toFixed(3)}</span>
        <span>Subjectivity {sentiment.subjectivity.toFixed(3)}</span>
      </div>
      <div style={{ height: 220 }}>
        <ResponsiveContainer width="100%" height="100%">
          <BarChart data={sentimentBars(sentiment)}>
            <CartesianGrid strokeDasharray="3 3" />
            <XAxis dataKey="name" />
            <YAxis domain={[0, 1]} />
            <Tooltip />
            <Bar dataKey="value" name="Share of words">
              {sentimentBars(sentiment).map(bar => (
                <Cell key={bar.name} fill={SENTIMENT_COLORS[bar.name]} />
              ))}
            </Bar>
          </BarChart>
        </ResponsiveContainer>
      </div>
    </div>
  );
}

function BrandChart({ report }: { report: AnalysisReport }) {
  return (
    <div className="result-card">
      <h3>🏷️ Brand Mention Frequency</h3>
      <div style={{ height: 260 }}>
        <ResponsiveContainer width="100%" height="100%">
          <BarChart data={mentionBars(report.mentions)}>
            <CartesianGrid strokeDasharray="3 3" />
            <XAxis dataKey="brand" />
            <YAxis allowDecimals={false} />
            <Tooltip />
            <Bar dataKey="mentions" name="Mentions" fill="#3e63dd" />
          </BarChart>
        </ResponsiveContainer>
      </div>
    </div>
  );
}

export function ReportView({ report, summary }: { report: AnalysisReport; summary: TrendSummary | null }) {
  return (
    <div className="results">
      <div className="summary-card">
        <h2>Analysis Complete</h2>
        <p>
          {report.document.text.length.toLocaleString()} characters analyzed
          {report.document.sourceUrl && <span className="scraped-badge">✓ {report.document.sourceUrl}</span>}
        </p>
        <div className="chips">
          {report.hashtags.map(tag => <span key={tag} className="chip">{tag}</span>)}
        </div>
      </div>

      <div className="grid">
        <SentimentCard report={report} />
        <BrandChart report={report} />

        <div className="result-card full-width">
          <h3>🔑 Keywords</h3>
          {report.keywords.length > 0 ? (
            <ul className="keyword-list">
              {keywordWidths(report.keywords).map(({ keyword, percent }, i) => (
                <li key={keyword}>
                  <span className="keyword-name">{keyword}</span>
                  <span className="keyword-bar" style={{ width: `${percent}%` }} />
                  <span className="keyword-weight">{report.keywords[i].weight.toFixed(4)}</span>
                </li>
              ))}
            </ul>
          ) : (
            <div style={{ color: 'var(--text-muted)', fontSize: 14 }}>No keywords found in this content.</div>
          )}
        </div>

        {summary && (
          <div className="result-card full-width">
            <h3>📈 Trend Summary</h3>
            <ul className="trend-list">
              {summary.trends.map(t => (
                <li key={t.title}><strong>{t.title}</strong>: {t.summary}</li>
              ))}
            </ul>
            {summary.competitorMentions.length > 0 && (
              <p><strong>Competitors:</strong> {summary.competitorMentions.join(', ')}</p>
            )}
            <p><strong>Brand perception:</strong> {summary.brandPerception}</p>
          </div>
        )}
      </div>
    </div>
  );
}
