export { RerankEngineUseCase } from "./rerank-engine.use-case";
