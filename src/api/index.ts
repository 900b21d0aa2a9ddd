export { addPackageSet } from './package-set.js'
export { addEditorSet } from './editor-set.js'
export { addShareFolderSet, askYesNo, askFolderName, validateFolderName } from './share-folder.js'
export type { ShareFolderAnswer } from './share-folder.js'
export { addVerificationSet } from './verify.js'
export { WORKFLOWS } from './workflows.js'
export type { Workflow, WorkflowId } from './workflows.js'
export { homeDirFor } from './context.js'
export type { BuildContext } from './context.js'
