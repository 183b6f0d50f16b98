export { RerankController } from "./rerank.controller";
