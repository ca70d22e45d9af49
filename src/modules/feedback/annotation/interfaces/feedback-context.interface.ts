// Read-only inputs shared by every unit of one run.
export type FeedbackContext = {
  problemStatement: string;
  rubric: string;
  language: string;
  draftReviewModel: string;
  summarizerModel: string;
};
