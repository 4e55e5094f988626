/**
 * Active Form Pointer Module
 */

export {
  ActiveFormPointer,
  ActiveFormPointerSchema,
  deriveResponsesUrl,
  type ActiveFormPointerData,
  type RedirectView,
} from './active-form.js';
