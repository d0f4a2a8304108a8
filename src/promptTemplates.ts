export const PROMPT_TEMPLATES = ['listar', 'resumo', 'comparar'] as const;

export type PromptTemplate = (typeof PROMPT_TEMPLATES)[number];

export interface PromptInputs {
  topic: string;
  region: string;
  days: number;
  link: string;
}

const MODE_LABELS: Record<PromptTemplate, string> = {
  listar: 'Modelos: listar oportunidades',
  resumo: 'Modelos: resumo de edital',
  comparar: 'Modelos: comparar chamadas',
};

const PASTE_LINK = '[cole aqui o link do edital]';

export function buildPrompt(
  template: PromptTemplate,
  inputs: PromptInputs,
): { prompt: string; modeLabel: string } {
  const link = inputs.link.trim();
  let prompt: string;

  switch (template) {
    case 'listar':
      prompt =
        `Liste oportunidades de financiamento (editais) relevantes para ${inputs.topic}, ` +
        `com foco em ${inputs.region}, prazo mínimo de ${inputs.days} dias. ` +
        `Considere também o contexto do edital (se aplicável) no seguinte link: ` +
        `${link || '[nenhum link fornecido]'}. ` +
        `Traga links oficiais e resuma os requisitos principais.`;
      break;
    case 'resumo':
      prompt =
        `Resuma o edital disponível no seguinte link: ${link || PASTE_LINK}. ` +
        `Explique em português claro: elegibilidade, prazos, valores, ` +
        `critérios de seleção e documentos necessários. ` +
        `Organize a resposta em bullet points e inclua o link novamente no final.`;
      break;
    case 'comparar':
      prompt =
        `Compare o edital do seguinte link principal: ${link || PASTE_LINK} ` +
        `com outras chamadas semelhantes que você encontrar ` +
        `para ${inputs.topic} em ${inputs.region}. ` +
        `Destaque diferenças em foco, elegibilidade, prazos e montantes. ` +
        `Produza uma tabela comparativa e bullets com as principais conclusões.`;
      break;
  }

  return { prompt, modeLabel: MODE_LABELS[template] };
}
