export { CensorEngine, type CensorOptions } from './censor.engine.js';
export {
    BatchOrchestrator,
    SidecarRegionSource,
    TemplateRegionSource,
    censoredFileName,
    writeAtomic,
    type RegionSource,
    type RunOptions,
} from './batch.orchestrator.js';
