export interface TaskValidation {
  valid: boolean;
  message: string;
  suggestions: string[];
}

const MIN_TASK_LENGTH = 5;
const VAGUE_KEYWORDS = ['something', 'anything', 'stuff', 'thing'];

/**
 * Heuristic check of a natural-language task before it is sent to the generator.
 * Vague wording is only a warning; the task stays valid.
 */
export function validateTaskDescription(taskDescription: string): TaskValidation {
  if (taskDescription.trim().length < MIN_TASK_LENGTH) {
    return {
      valid: false,
      message: 'Task description is too short. Please provide more details.',
      suggestions: [
        'Describe what you want the code to do',
        'Include input/output requirements',
        'Specify any constraints or requirements',
      ],
    };
  }

  const lowered = taskDescription.toLowerCase();
  if (VAGUE_KEYWORDS.some((keyword) => lowered.includes(keyword))) {
    return {
      valid: true,
      message: 'Your description seems vague. Consider being more specific.',
      suggestions: [
        'Be more specific about the desired functionality',
        'Include examples of expected input/output',
        'Mention any specific algorithms or approaches',
      ],
    };
  }

  return { valid: true, message: 'Task description looks good!', suggestions: [] };
}
