// A second extension name backed by the shell implementation.
export { ShellExtension as BuildExtension } from '../../../../../extensions/pipeline-extension-shell/index.js';
