export { startServer, SETTINGS_SECTION } from './server.js';
export type { ServerOptions } from './server.js';
export { toLspDiagnostic, toLspDiagnostics, DIAGNOSTIC_SOURCE } from './diagnostics.js';
export type { TargetDiagnosticData } from './diagnostics.js';
export { renderHover, renderSignatureHelp, renderCompletions } from './render.js';
