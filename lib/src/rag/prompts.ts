/**
 * Prompt Templates
 *
 * Built-in prompts for answer generation, query paraphrasing, keyword
 * extraction and intention detection. Placeholders are written `{name}` and filled by `fillTemplate`.
 */

import { z } from 'zod';

import { DEFAULT_RERANK_PROMPT } from '../rerank/index.js';

export const DEFAULT_SYSTEM_PROMPT = `Bạn là một trợ lý pháp lý chuyên nghiệp. Dựa trên câu hỏi của người dùng và các kết quả tìm kiếm liên quan được cung cấp, hãy trả lời câu hỏi và tuân thủ các yêu cầu sau:
1. Trích dẫn cơ sở pháp lý nếu có trong thông tin được cung cấp.
2. Chỉ trả lời câu hỏi dựa trên thông tin được cung cấp.
3. Không cố gắng sử dụng tất cả các thông tin được cung cấp, mà chỉ lựa chọn một hoặc một số thông tin có liên quan nhất để trả lời.
4. Tuyệt đối không được nhắc đến một cơ sở pháp lý, số hiệu văn bản, hoặc tên văn bản không nằm trong những nội dung đã được cung cấp.
5. Không được thêm ý kiến và hiểu biết của cá nhân; chỉ trả lời dựa vào các thông tin được cung cấp kèm câu hỏi.
6. Nếu dữ liệu được cung cấp không đủ để trả lời câu hỏi, không được tìm cách tự trả lời câu hỏi mà gợi ý một số cách đặt câu hỏi khác hoặc từ khóa khác để tìm được kết quả liên quan hơn.
7. Khi trích dẫn nguồn, hãy tham chiếu đến Mã tài liệu (Record ID) được cung cấp trong ngữ cảnh theo định dạng: [Mã tài liệu: <record_id>].
Ví dụ: "Theo quy định trong [Mã tài liệu: QA_750F0D91], ...".
8. Luôn trả lời bằng tiếng Việt.`;

export const DEFAULT_USER_PROMPT = 'User Question: {query}\n\nRelated information:\n\n{context}';

export const DEFAULT_PARAPHRASE_PROMPT =
  'Viết lại câu hỏi sau đây sử dụng ngôn ngữ, thuật ngữ pháp lý:\n\n{query}';

export const DEFAULT_KEYWORD_PROMPT = `Extract the top {topK} keywords from the following question and return them in a JSON array format.

The keywords must:
- Be in the same language as the question.
- Prioritize legal terms, concepts, and terminology likely to appear in legal documents, cases, or articles.
- Avoid overly broad or vague terms unless directly relevant.

Example:
Question: "thủ tục đăng ký thay đổi người đại diện theo pháp luật của doanh nghiệp?"
Return: {"keywords": ["đăng ký kinh doanh", "người đại diện", "luật doanh nghiệp", "giấy phép kinh doanh", "thông tin doanh nghiệp", "đăng ký doanh nghiệp"]}

Now, extract keywords for the following question:
Question: "{query}"

Return the keywords in this format:
{"keywords": ["keyword1", "keyword2", "keyword3", ...]}`;

export const DEFAULT_INTENT_PROMPT = `You are an assistant that classifies user queries into one of the following categories:
1. "irrelevant": The query is not related to Vietnamese law or legal procedures.
2. "history": The query can be answered from the conversation history alone.
3. "rag": Legal documents from the database are required to answer the query.

Conversation History:
{history}

User Query:
"{query}"

Reply with a JSON object: {"intention": "<irrelevant|history|rag>", "response": "<reply>"}
- For "irrelevant", the reply politely explains in Vietnamese that only legal questions are answered.
- For "history", the reply answers the query in Vietnamese using only the conversation history.
- For "rag", the reply is an empty string.`;

// =============================================================================
// Template Schema
// =============================================================================

export const PromptTemplateSchema = z.object({
  /** System message; may reference `{query}` and `{context}` */
  systemPrompt: z.string().min(1).default(DEFAULT_SYSTEM_PROMPT),
  /** User message; may reference `{query}` and `{context}` */
  userPrompt: z.string().min(1).default(DEFAULT_USER_PROMPT),
  /** Single-turn prompt used when the first retrieval finds nothing */
  paraphrasePrompt: z.string().min(1).default(DEFAULT_PARAPHRASE_PROMPT),
  /** Keyword extraction prompt; `{query}` and `{topK}` */
  keywordPrompt: z.string().min(1).default(DEFAULT_KEYWORD_PROMPT),
  /** Relevance prompt of the LLM reranker; `{query}` and `{document}` */
  rerankPrompt: z.string().min(1).default(DEFAULT_RERANK_PROMPT),
  /** Query classification prompt; `{query}` and `{history}` */
  intentPrompt: z.string().min(1).default(DEFAULT_INTENT_PROMPT),
});

export type PromptTemplate = z.infer<typeof PromptTemplateSchema>;
export type PromptTemplateInput = z.input<typeof PromptTemplateSchema>;

export const DEFAULT_PROMPT_TEMPLATE: PromptTemplate = PromptTemplateSchema.parse({});

const PLACEHOLDER = /\{(\w+)\}/g;

/**
 * Replace `{name}` placeholders. Unknown placeholders and literal braces
 * (the JSON in the keyword prompt) are left as they are.
 */
export function fillTemplate(
  template: string,
  values: Readonly<Record<string, string | number>>
): string {
  return template.replace(PLACEHOLDER, (match, name: string) => {
    const value = values[name];
    return value === undefined ? match : String(value);
  });
}
