export enum PromptType {
  Input = "input",
  Confirm = "confirm",
}

export const SUBTITLE_FORMATS = ["vtt"] as const;
