import dayjs from "dayjs";

interface BaseFields {
  studentName: string;
  studentId: string;
  applicationId: string;
  programName: string;
}

export interface TemplateFieldsMap {
  application_received: BaseFields & { documents: string[] };
  information_required: BaseFields & { deadline: Date; missing: string[] };
  validation_passed: BaseFields & { feedback: string };
  validation_failed: BaseFields & { feedback: string; issues: string[] };
}

export type TemplateName = keyof TemplateFieldsMap;

export interface RenderedEmail {
  subject: string;
  text: string;
}

const greeting = (name: string): string => `Dear ${name.trim() || "Applicant"},`;

const reference = (fields: BaseFields): string[] => [
  `Application ID: ${fields.applicationId}`,
  `Student ID: ${fields.studentId}`,
];

const signature = (programName: string): string[] => ["", "Regards,", `${programName} Admissions Team`];

const bullets = (items: string[]): string[] => items.map((item) => `- ${item}`);

type Renderers = { [K in TemplateName]: (fields: TemplateFieldsMap[K]) => RenderedEmail };

const renderers: Renderers = {
  application_received: (fields) => {
    const lines: string[] = [greeting(fields.studentName), ""];
    lines.push(`We have received your application to the ${fields.programName}.`);
    lines.push(...reference(fields));
    if (fields.documents.length > 0) {
      lines.push("");
      lines.push(`Documents received: ${fields.documents.length}`);
      lines.push(...bullets(fields.documents));
    }
    lines.push("");
    lines.push("Your documents are now being validated. We will email you the result.");
    lines.push(...signature(fields.programName));
    return { subject: `Application Received - ${fields.programName}`, text: lines.join("\n") };
  },

  information_required: (fields) => {
    const lines: string[] = [greeting(fields.studentName), ""];
    lines.push(`Thank you for your interest in the ${fields.programName}.`);
    lines.push(...reference(fields));
    lines.push("");
    lines.push("Your email did not include the documents we need to process your application.");
    if (fields.missing.length > 0) {
      lines.push("Please reply to this email with:");
      lines.push(...bullets(fields.missing));
    }
    lines.push("");
    lines.push(`Please send them by ${dayjs(fields.deadline).format("YYYY-MM-DD")}.`);
    lines.push(...signature(fields.programName));
    return { subject: `Action Required: Documents Needed - ${fields.programName}`, text: lines.join("\n") };
  },

  validation_passed: (fields) => {
    const lines: string[] = [greeting(fields.studentName), ""];
    lines.push("Your application documents passed validation and are now with our review team.");
    lines.push(...reference(fields));
    if (fields.feedback) {
      lines.push("");
      lines.push(`Feedback: ${fields.feedback}`);
    }
    lines.push(...signature(fields.programName));
    return { subject: "Application Successfully Validated", text: lines.join("\n") };
  },

  validation_failed: (fields) => {
    const lines: string[] = [greeting(fields.studentName), ""];
    lines.push("We found problems with the documents in your application.");
    lines.push(...reference(fields));
    if (fields.feedback) {
      lines.push("");
      lines.push(`Feedback: ${fields.feedback}`);
    }
    if (fields.issues.length > 0) {
      lines.push("");
      lines.push("Issues found:");
      lines.push(...bullets(fields.issues));
    }
    lines.push("");
    lines.push("Reply to this email with corrected documents and we will validate them again.");
    lines.push(...signature(fields.programName));
    return { subject: "Action Required: Application Issues Detected", text: lines.join("\n") };
  },
};

export const renderTemplate = <T extends TemplateName>(name: T, fields: TemplateFieldsMap[T]): RenderedEmail => {
  const render: (input: TemplateFieldsMap[T]) => RenderedEmail = renderers[name];
  return render(fields);
};
