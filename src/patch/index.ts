export { computeTextEdits, applyTextEdits, offsetEdits } from './TextDiff';
export {
  PatchEngine,
  PatchError,
  PatchErrorReason,
  createPatchPlan,
  locateBefore,
  locateAfter,
} from './PatchEngine';
