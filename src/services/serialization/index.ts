// Change specification loading and result serialization

export { ChangeSpecLoader, parseChangeSpecification } from './change-spec-loader.js';
export { serializeResult, serializeScores } from './result-serializer.js';
