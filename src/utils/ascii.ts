import figlet from "figlet";
import { logger } from "./logger.js";

/**
 * Banner text in the Standard figlet font. Falls back to the plain message.
 */
export const getAsciiArt = (msg: string): string => {
  try {
    return figlet.textSync(msg, {
      font: "Standard",
      horizontalLayout: "default",
      verticalLayout: "default",
      width: 80,
      whitespaceBreak: true,
    });
  } catch (error) {
    logger.debug("Font rendering failed:", error);
    return msg;
  }
};
