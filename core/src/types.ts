export interface Settings {
  ollamaUrl: string;
  model: string;
}

/** Relative file path → text content, frozen once collected. */
export type CodebaseSnapshot = Readonly<Record<string, string>>;

export interface GenerateRequest {
  model: string;
  prompt: string;
  stream: boolean;
}

export interface GenerateFragment {
  response: string;
  done: boolean;
}

export interface DiffOptions {
  path: string;
  staged?: boolean;
  cwd?: string;
}

export interface ReviewOptions {
  path?: string;
  staged?: boolean;
  maxFiles?: number;
  model?: string;
  ollamaUrl?: string;
}
