export { FileLogger } from "./file/file.logger";
