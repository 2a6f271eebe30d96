import { examineUploadForm, loadUploadForm, type ExaminedForm } from "../domain/form/store.js";

export interface ExamineCommandInput {
  path: string;
}

export interface ExamineCommandOutput {
  path: string;
  form: ExaminedForm;
}

export async function runExamineCommand(input: ExamineCommandInput): Promise<ExamineCommandOutput> {
  const form = await loadUploadForm(input.path);
  return {
    path: input.path,
    form: examineUploadForm(form),
  };
}

export function renderExamineOutput(output: ExamineCommandOutput): string {
  return renderExaminedForm(output.form);
}

export function renderExaminedForm(form: ExaminedForm): string {
  return Object.entries(form)
    .map(([name, value]) => `${name}: ${value}`)
    .join("\n");
}
