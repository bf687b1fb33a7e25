export const LESSON_SYSTEM_PROMPT = `You are an expert medical educator creating high-yield, exam-focused content for medical students preparing for USMLE, PLAB, and similar exams.

Your content must be:
- Clinically accurate and evidence-based
- Concise and focused on high-yield information
- Exam-oriented with realistic clinical scenarios
- Memorable with effective mnemonics

Format your response as valid JSON with the exact structure requested.`;

export const LESSON_PROMPT = `Generate medical educational content for:
**Topic**: {{topic}}
**Subtopic**: {{subtopic}}

Create the following in JSON format:

1. **Clinical Case** (1-2 sentences): A brief, realistic clinical scenario that hooks the learner. Include key presenting symptoms, relevant history, and physical exam findings.

2. **Case-Based MCQs** (3 questions): Create 3 multiple-choice questions directly related to the clinical case. Each should test a different aspect (diagnosis, management, complications). Each question must have 4 options (A, B, C, D).

3. **Independent MCQs** (2 questions): Create 2 additional MCQs on the same topic/subtopic but NOT directly related to the case. Each must have 4 options (A, B, C, D).

4. **Answers**: Correct answers for all 5 questions, keyed "1" to "5".

5. **Mnemonic**: One memorable mnemonic for a key concept of this topic, under 10 words.

**Output Format (JSON)**:
{
  "case_text": "Brief 1-2 sentence clinical case here",
  "case_based_mcqs": [
    { "question": "Question 1 text?", "options": { "A": "...", "B": "...", "C": "...", "D": "..." } },
    { "question": "Question 2 text?", "options": { "A": "...", "B": "...", "C": "...", "D": "..." } },
    { "question": "Question 3 text?", "options": { "A": "...", "B": "...", "C": "...", "D": "..." } }
  ],
  "independent_mcqs": [
    { "question": "Question 4 text?", "options": { "A": "...", "B": "...", "C": "...", "D": "..." } },
    { "question": "Question 5 text?", "options": { "A": "...", "B": "...", "C": "...", "D": "..." } }
  ],
  "answers": { "1": "B", "2": "A", "3": "D", "4": "C", "5": "A" },
  "mnemonic": "Short memorable mnemonic here"
}

Return ONLY the JSON object, no additional text.`;

export const TOPICS_SYSTEM_PROMPT = 'You are an expert medical educator creating curriculum content.';

export const TOPICS_PROMPT = `Generate {{count}} new medical education topics for the subject: {{subject}}

Each topic should include:
1. A main topic category
2. A specific subtopic

The topics should be clinically relevant and high-yield for medical exams, appropriate for medical students, and cover different aspects of {{subject}}.

Return as JSON array:
[
  {"topic": "Main Topic", "subtopic": "Specific Subtopic"}
]

Return ONLY the JSON array, no additional text.`;

export function fillPrompt(template: string, values: Record<string, string | number>): string {
    return template.replace(/\{\{(\w+)\}\}/g, (match: string, key: string) =>
        key in values ? String(values[key]) : match
    );
}
