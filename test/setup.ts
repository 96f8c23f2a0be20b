import { LogLevel } from "../src/app/LogLevel";
import { setConsoleLevel } from "../src/app/consoleLevel";

setConsoleLevel(LogLevel.Silent);
