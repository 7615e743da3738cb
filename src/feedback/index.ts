export {
  FeedbackComposer,
  type FeedbackComposerOptions,
  type ComposeOptions,
} from "./composer.js";
