import { useEffect, useState } from 'react';
import { onAuthStateChanged, signOut, type Auth, type User } from 'firebase/auth';
import type { AnalysisReport, PipelineStage, PublicConfig, StreamEvent, TrendSummary } from '../shared/api.js';
import { LoginPanel } from './components/LoginPanel.js';
import { ReportView } from './components/ReportView.js';
import { fetchPublicConfig, requestSummary, streamAnalysis } from './lib/api.js';
import { parseBrandList } from './lib/chartData.js';
import { getFirebaseAuth } from './lib/firebase.js';

const STEPS: { stage: PipelineStage; label: string }[] = [
  { stage: 'loading', label: '🔍 Loading content' },
  { stage: 'analyzing', label: '🧠 Sentiment, keywords and brand mentions' },
  { stage: 'aggregating', label: '📊 Building the report' },
];

type InputMode = 'url' | 'text';

export default function App() {
  const [config, setConfig] = useState<PublicConfig | null>(null);
  const [auth, setAuth] = useState<Auth | null>(null);
  const [user, setUser] = useState<User | null>(null);
  const [authReady, setAuthReady] = useState(false);

  const [mode, setMode] = useState<InputMode>('url');
  const [form, setForm] = useState({ url: '', text: '', brands: '' });
  const [report, setReport] = useState<AnalysisReport | null>(null);
  const [summary, setSummary] = useState<TrendSummary | null>(null);
  const [loading, setLoading] = useState(false);
  const [summarizing, setSummarizing] = useState(false);
  const [step, setStep] = useState(-1);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    let unsubscribe: (() => void) | undefined;
    fetchPublicConfig()
      .then(cfg => {
        setConfig(cfg);
        setForm(f => ({ ...f, brands: cfg.defaultBrands.join(', ') }));
        if (!cfg.firebase) {
          setAuthReady(true);
          return;
        }
        const firebaseAuth = getFirebaseAuth(cfg.firebase);
        setAuth(firebaseAuth);
        unsubscribe = onAuthStateChanged(firebaseAuth, u => {
          setUser(u);
          setAuthReady(true);
        });
      })
      .catch((err: unknown) => {
        console.error(err);
        setError(err instanceof Error ? err.message : 'Could not load configuration');
        setAuthReady(true);
      });
    return () => unsubscribe?.();
  }, []);

  const handleChange = (e: React.ChangeEvent<HTMLInputElement | HTMLTextAreaElement>) => {
    setForm(prev => ({ ...prev, [e.target.name]: e.target.value }));
  };

  const buildRequest = () => ({
    ...(mode === 'url' ? { url: form.url } : { text: form.text }),
    brands: parseBrandList(form.brands),
  });

  const handleStreamEvent = (event: StreamEvent) => {
    switch (event.type) {
      case 'stage':
        setStep(STEPS.findIndex(s => s.stage === event.step));
        break;
      case 'report':
        setReport(event.data);
        break;
      case 'error':
        setError(event.message);
        break;
      case 'done':
        break;
    }
  };

  const handleSubmit = async (e: React.FormEvent) => {
    e.preventDefault();
    if (!user) return;
    setLoading(true);
    setError(null);
    setReport(null);
    setSummary(null);
    setStep(0);

    try {
      const idToken = await user.getIdToken();
      await streamAnalysis(idToken, buildRequest(), handleStreamEvent);
    } catch (err) {
      console.error(err);
      setError(err instanceof Error ? err.message : 'Streaming failed');
    } finally {
      setLoading(false);
      setStep(-1);
    }
  };

  const handleSummarize = async () => {
    if (!user) return;
    setSummarizing(true);
    setError(null);
    try {
      const idToken = await user.getIdToken();
      setSummary(await requestSummary(idToken, buildRequest()));
    } catch (err) {
      console.error(err);
      setError(err instanceof Error ? err.message : 'Summary failed');
    } finally {
      setSummarizing(false);
    }
  };

  const header = (
    <div className="header">
      <div className="badge">⚡ Content Insights</div>
      <h1>Trend &amp; Brand<br />Insights</h1>
      <p>Measure sentiment, surface keywords and hashtags, and count brand mentions in any article or text.</p>
      {user && (
        <div className="user-bar">
          <span>{user.email ?? user.uid}</span>
          <button type="button" className="link-btn" onClick={() => auth && signOut(auth).catch(console.error)}>
            Sign out
          </button>
        </div>
      )}
    </div>
  );

  if (!authReady) {
    return <div className="app">{header}<div className="form-wrap"><span className="spinner" /></div></div>;
  }

  if (!config?.firebase || !auth) {
    return (
      <div className="app">
        {header}
        <div className="form-wrap">
          <div className="error-box">❌ {error ?? 'Sign-in is not configured on this server'}</div>
        </div>
      </div>
    );
  }

  if (!user) {
    return <div className="app">{header}<LoginPanel auth={auth} /></div>;
  }

  return (
    <div className="app">
      {header}

      <div className="form-wrap">
        <div className="card">
          <div className="tabs">
            <button type="button" className={mode === 'url' ? 'tab active' : 'tab'} onClick={() => setMode('url')}>
              URL
            </button>
            <button type="button" className={mode === 'text' ? 'tab active' : 'tab'} onClick={() => setMode('text')}>
              Text
            </button>
          </div>
          <form onSubmit={handleSubmit}>
            {mode === 'url' ? (
              <div className="field">
                <label htmlFor="url">Article URL</label>
                <input id="url" name="url" type="url" required
                  placeholder="https://example.com/article" value={form.url} onChange={handleChange} />
              </div>
            ) : (
              <div className="field">
                <label htmlFor="text">Text</label>
                <textarea id="text" name="text" rows={10} required
                  placeholder="Paste a post, review or article..." value={form.text} onChange={handleChange} />
              </div>
            )}
            <div className="field">
              <label htmlFor="brands">Brands <span style={{ opacity: 0.5, fontWeight: 400 }}>(comma separated)</span></label>
              <input id="brands" name="brands" type="text"
                placeholder="Apple, Samsung, Google" value={form.brands} onChange={handleChange} />
            </div>
            <button type="submit" disabled={loading} className="btn">
              {loading ? <span className="btn-loading"><span className="spinner" /> Analyzing...</span> : 'Analyze →'}
            </button>
          </form>

          {loading && (
            <div className="status-steps">
              {STEPS.map((s, i) => (
                <div key={s.stage} className={`step ${i === step ? 'active' : i < step ? 'done' : ''}`}>
                  <span className="dot" />
                  {i < step ? '✓ ' : ''}{s.label}
                </div>
              ))}
            </div>
          )}
          {error && <div className="error-box">❌ {error}</div>}
        </div>
      </div>

      {report && !loading && (
        <>
          {config.summariesEnabled && (
            <div className="form-wrap">
              <button type="button" className="btn secondary" disabled={summarizing} onClick={handleSummarize}>
                {summarizing ? <span className="btn-loading"><span className="spinner" /> Summarizing...</span> : '🤖 Summarize trends'}
              </button>
            </div>
          )}
          <ReportView report={report} summary={summary} />
        </>
      )}
    </div>
  );
}
