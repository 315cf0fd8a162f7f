export {State, ExecState, normalizeTarget, type RunSpec, type RunMount, type RunEnv} from './state.js'
export {marshal, stateFromDefinition, digestOf, outputCount, type MarshalOptions} from './marshal.js'
export {hostPlatform, parsePlatform, formatPlatform} from './platform.js'
export {isDefinition, isPlatform, isOp} from './types.js'
export type {Platform, Op, ImageOp, LocalOp, ExecOp, ExecMount, OutputRef, DefinitionOp, Definition} from './types.js'
