import { setSilentMode } from "./src/utils/logger.js";

setSilentMode(true);
