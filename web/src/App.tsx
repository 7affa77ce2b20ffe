// web/src/App.tsx
import { useEffect, useState } from "react";

import { LANGUAGES, languageName } from "../../src/languages.js";
import type { Notice } from "../../src/schemas.js";
import { CredentialsUnavailableError, httpApi, type TranslatorApi } from "./api.js";

type Phase = "checking" | "halted" | "idle" | "pending";

type Result = {
  languageName: string;
  text: string;
};

const noticeColors: Record<Notice["level"], string> = {
  error: "#b00020",
  warning: "#8a6d00",
};

export default function App({ api = httpApi }: { api?: TranslatorApi }) {
  const [phase, setPhase] = useState<Phase>("checking");
  const [fatal, setFatal] = useState<string | null>(null);

  const [originalText, setOriginalText] = useState("");
  const [targetLanguage, setTargetLanguage] = useState<string>(LANGUAGES[0].code);

  const [result, setResult] = useState<Result | null>(null);
  const [notices, setNotices] = useState<Notice[]>([]);

  function halt(message: string) {
    setFatal(message);
    setPhase("halted");
  }

  // Credentials are resolved on the server the first time anyone asks.
  useEffect(() => {
    let active = true;
    api
      .status()
      .then(() => {
        if (active) setPhase("idle");
      })
      .catch((e: unknown) => {
        if (!active) return;
        if (e instanceof CredentialsUnavailableError) halt(e.message);
        else {
          setNotices([{ level: "error", message: e instanceof Error ? e.message : String(e) }]);
          setPhase("idle");
        }
      });
    return () => {
      active = false;
    };
  }, [api]);

  async function submit() {
    setResult(null);

    if (!originalText) {
      setNotices([{ level: "warning", message: "Please enter some text to translate." }]);
      return;
    }

    setNotices([]);
    setPhase("pending");

    try {
      const data = await api.translate(originalText, targetLanguage);
      setNotices(data.notices);
      if (data.translated_text) {
        setResult({ languageName: languageName(targetLanguage), text: data.translated_text });
      }
      setPhase("idle");
    } catch (e: unknown) {
      if (e instanceof CredentialsUnavailableError) {
        halt(e.message);
        return;
      }
      setNotices([{ level: "error", message: e instanceof Error ? e.message : String(e) }]);
      setPhase("idle");
    }
  }

  if (phase === "halted") {
    return (
      <div style={{ padding: 24, fontFamily: "system-ui, sans-serif", maxWidth: 720 }}>
        <pre role="alert" style={{ color: noticeColors.error, whiteSpace: "pre-wrap" }}>
          {fatal}
        </pre>
      </div>
    );
  }

  const loading = phase === "checking" || phase === "pending";

  return (
    <div style={{ padding: 32, fontFamily: "system-ui, sans-serif", maxWidth: 720, margin: "0 auto" }}>
      <h1 style={{ margin: 0 }}>🌐 School Notice Translator</h1>
      <p style={{ opacity: 0.8, marginTop: 8, lineHeight: 1.5 }}>
        Translate school communications.
        <br />
        Traducir folletos o comunicaciones escolares.
        <br />
        Dịch tờ rơi hoặc thông tin liên lạc của trường.
        <br />
        Isalin ang mga flyer ng paaralan o komunikasyon.
      </p>

      <label htmlFor="original-text" style={{ display: "block", marginTop: 16 }}>
        Enter the text to translate:
      </label>
      <textarea
        id="original-text"
        rows={8}
        style={{ width: "100%", fontSize: 16, borderRadius: 10, padding: 8 }}
        placeholder="e.g., 'Dear Parents, tomorrow is a half-day.'"
        value={originalText}
        onChange={(e) => setOriginalText(e.target.value)}
      />

      <label htmlFor="target-language" style={{ display: "block", marginTop: 12 }}>
        Select Target Language
      </label>
      <select
        id="target-language"
        style={{ width: "100%", fontSize: 16, padding: 6 }}
        value={targetLanguage}
        onChange={(e) => setTargetLanguage(e.target.value)}
      >
        {LANGUAGES.map((l) => (
          <option key={l.code} value={l.code}>
            {l.name}
          </option>
        ))}
      </select>

      <button
        onClick={submit}
        disabled={loading}
        style={{
          marginTop: 16,
          padding: "10px 24px",
          borderRadius: 10,
          border: "none",
          background: "#4CAF50",
          color: "white",
          fontWeight: "bold",
          cursor: "pointer",
        }}
      >
        Translate
      </button>

      {phase === "pending" && <p role="status">Translating...</p>}

      {notices.map((n, i) => (
        <p key={i} role="alert" style={{ color: noticeColors[n.level], whiteSpace: "pre-wrap" }}>
          {n.message}
        </p>
      ))}

      {result && (
        <section style={{ marginTop: 18 }}>
          <h3>Translated Text ({result.languageName})</h3>
          <p
            data-testid="translated-text"
            style={{ background: "#e8f5e9", borderRadius: 10, padding: 12, whiteSpace: "pre-wrap" }}
          >
            {result.text}
          </p>
        </section>
      )}
    </div>
  );
}
