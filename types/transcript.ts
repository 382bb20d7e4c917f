export type TranscriptionProvider = "whisper" | "assemblyai" | "deepgram";

export interface CaptionSegment {
  text: string;
  startMs: number;
  durationMs: number;
}

export interface CaptionTranscript {
  kind: "captions";
  languageCode: string;
  segments: CaptionSegment[];
  text: string;
}

export interface AudioTranscript {
  kind: "transcription";
  provider: TranscriptionProvider;
  text: string;
}

export type TranscriptResult = CaptionTranscript | AudioTranscript;

export type TranscriptSource = TranscriptResult["kind"];
