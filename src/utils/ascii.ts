import figlet from "figlet";
import { logger } from "./logger.js";

const BANNER_OPTIONS = {
  horizontalLayout: "default",
  verticalLayout: "default",
  width: 80,
  whitespaceBreak: true,
} as const;

/**
 * Generate ASCII art text using the Standard font
 * @param msg - Message to convert to ASCII art
 * @returns ASCII art string, or the message itself if figlet cannot render it
 */
export const getAsciiArt = (msg: string): string => {
  try {
    return figlet.textSync(msg, { font: "Standard", ...BANNER_OPTIONS });
  } catch (error) {
    logger.warn("Warning: Font rendering failed, using plain text", error);
    return msg;
  }
};
