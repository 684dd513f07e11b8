import figlet from "figlet";
import { getErrorMessage } from "../errors.js";
import { logger } from "./logger.js";

const BANNER_FONT: figlet.Fonts = "Standard";

/**
 * Render a banner with figlet, falling back to the plain message
 * @param msg - Message to convert to ASCII art
 * @param width - Maximum banner width in columns
 */
export const getAsciiArt = (msg: string, width = 80): string => {
  try {
    return figlet.textSync(msg, {
      font: BANNER_FONT,
      horizontalLayout: "default",
      verticalLayout: "default",
      width,
      whitespaceBreak: true,
    });
  } catch (error) {
    logger.debug(`Banner rendering failed: ${getErrorMessage(error)}`);
    return msg;
  }
};
