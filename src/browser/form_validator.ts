import { CONFIG, FIELD_SELECTOR, MESSAGES, VALIDATORS } from "./config.js";
import { Binding } from "./listeners.js";

export type FormField = HTMLInputElement | HTMLTextAreaElement | HTMLSelectElement;

export type FormSubmitter = (data: Record<string, string>, form: HTMLFormElement) => Promise<void>;

export type ModalHandle = { closeModal(): void };

export type FormValidatorOptions = {
  submit?: FormSubmitter;
  modal?: () => ModalHandle | undefined;
};

const INTERCEPTED_FORMS = ["modal-form", "hero-form"];

export function isFormField(target: EventTarget | null): target is FormField {
  return (
    target instanceof HTMLInputElement ||
    target instanceof HTMLTextAreaElement ||
    target instanceof HTMLSelectElement
  );
}

/** Error message for the field's current value, or null when it is valid. */
export function fieldError(field: FormField): string | null {
  const value = field.value.trim();
  const required = field.hasAttribute("required");
  const type = field.type;

  if (!value) return required ? MESSAGES.required : null;
  if (type === "email" && !VALIDATORS.email.test(value)) return MESSAGES.email;
  if (type === "tel" && !VALIDATORS.phone.test(value)) return MESSAGES.phone;
  if (field.name === "name" && !VALIDATORS.name.test(value)) return MESSAGES.name;
  if (type === "textarea" && value.length < 10) return MESSAGES.details;
  return null;
}

export function formDataRecord(form: HTMLFormElement): Record<string, string> {
  const out: Record<string, string> = {};
  new FormData(form).forEach((value, key) => {
    out[key] = typeof value === "string" ? value : value.name;
  });
  return out;
}

export const submitFormData: FormSubmitter = async (data, form) => {
  const endpoint = form.dataset.endpoint;
  if (!endpoint) {
    // no backend configured for this form: behave like a successful request
    await new Promise<void>((resolve) => setTimeout(resolve, CONFIG.simulatedSubmitMs));
    return;
  }
  const res = await fetch(endpoint, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify({ form: form.id, ...data })
  });
  if (!res.ok) {
    throw new Error(`submit_failed_${res.status}`);
  }
};

export class FormValidator extends Binding {
  private readonly submit: FormSubmitter;
  private readonly modal: () => ModalHandle | undefined;
  private readonly timers = new Set<ReturnType<typeof setTimeout>>();

  constructor(options: FormValidatorOptions = {}) {
    super();
    this.submit = options.submit ?? submitFormData;
    this.modal = options.modal ?? (() => window.modalSystem);
    this.init();
  }

  private init() {
    document.addEventListener(
      "submit",
      (event) => {
        const form = event.target;
        if (!(form instanceof HTMLFormElement)) return;
        if (!INTERCEPTED_FORMS.some((name) => form.classList.contains(name))) return;
        event.preventDefault();
        this.handleFormSubmission(form).catch((err: unknown) => {
          console.error("[form] submission handler failed", err);
        });
      },
      { signal: this.signal }
    );

    document.addEventListener(
      "input",
      (event) => {
        if (isFormField(event.target)) this.validateField(event.target);
      },
      { signal: this.signal }
    );

    // blur does not bubble
    document.addEventListener(
      "blur",
      (event) => {
        if (isFormField(event.target)) this.validateField(event.target, true);
      },
      { capture: true, signal: this.signal }
    );
  }

  validateField(field: FormField, showErrors = false): boolean {
    const group = field.closest(".form-group") ?? field.parentElement;
    const error = fieldError(field);
    if (!group) return error === null;

    group.classList.remove("error", "success");
    this.clearFieldMessage(group);

    if (!field.value.trim() && !field.hasAttribute("required")) return true;

    if (error !== null) {
      group.classList.add("error");
      this.showFieldMessage(group, error, "error");
    } else if (showErrors) {
      group.classList.add("success");
      this.showFieldMessage(group, MESSAGES.fieldOk, "success");
    }
    return error === null;
  }

  validateForm(form: HTMLFormElement): boolean {
    let valid = true;
    form.querySelectorAll<FormField>(FIELD_SELECTOR).forEach((field) => {
      if (!this.validateField(field, true)) valid = false;
    });
    return valid;
  }

  showFieldMessage(group: Element, message: string, type: "error" | "success") {
    this.clearFieldMessage(group);
    const el = document.createElement("div");
    el.className = type === "error" ? "form-error" : "form-success";
    el.textContent = message;
    group.appendChild(el);
  }

  clearFieldMessage(group: Element) {
    Array.from(group.children)
      .filter((el) => el.classList.contains("form-error") || el.classList.contains("form-success"))
      .forEach((el) => el.remove());
  }

  async handleFormSubmission(form: HTMLFormElement) {
    if (!this.validateForm(form)) {
      this.showFormMessage(form, MESSAGES.fixErrors, "error");
      return;
    }

    const button = form.querySelector<HTMLButtonElement>('button[type="submit"]');
    const originalText = button?.textContent ?? "";
    if (button) {
      button.classList.add("loading");
      button.disabled = true;
      button.textContent = MESSAGES.sending;
    }

    try {
      await this.submit(formDataRecord(form), form);
      this.showFormMessage(form, MESSAGES.sent, "success");
      form.reset();
      if (form.closest(".modal-overlay")) {
        this.later(() => this.modal()?.closeModal(), CONFIG.modalCloseAfterSuccessMs);
      }
    } catch (err) {
      console.error("[form] submission error", err);
      this.showFormMessage(form, MESSAGES.failed, "error");
    } finally {
      this.later(() => {
        if (!button) return;
        button.classList.remove("loading");
        button.disabled = false;
        button.textContent = originalText;
      }, CONFIG.formResetMs);
    }
  }

  private later(fn: () => void, delayMs: number) {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      fn();
    }, delayMs);
    this.timers.add(timer);
  }

  override dispose() {
    super.dispose();
    this.timers.forEach((timer) => clearTimeout(timer));
    this.timers.clear();
  }

  showFormMessage(form: HTMLFormElement, message: string, type: "error" | "success") {
    this.clearFormMessages(form);
    const el = document.createElement("div");
    el.className = `form-message ${type === "error" ? "form-error" : "form-success"}`;
    el.textContent = message;
    form.insertBefore(el, form.firstChild);
  }

  clearFormMessages(form: HTMLFormElement) {
    form.querySelectorAll(".form-message").forEach((el) => el.remove());
  }
}
