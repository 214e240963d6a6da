export const ANIMATION_SELECTOR =
  ".animate-on-scroll, .fade-in, .fade-in-left, .fade-in-right, .fade-in-up, .slide-in-left, .scale-in";

export const LAZY_IMAGE_SELECTOR = "img[data-src], .lazy-image";

export const FIELD_SELECTOR = "input, textarea, select";

export const CONFIG = {
  observerOptions: {
    root: null,
    rootMargin: "20px",
    threshold: 0.1
  } satisfies IntersectionObserverInit,
  lazyImageOptions: {
    rootMargin: "50px"
  } satisfies IntersectionObserverInit,
  // ms between staggered animations
  animationDelay: 100,
  submitButtonResetMs: 3000,
  formResetMs: 2000,
  simulatedSubmitMs: 1500,
  modalCloseAfterSuccessMs: 2000,
  modalExitMs: 300,
  modalFocusDelayMs: 100,
  headerOffset: 100,
  navHideThreshold: 100,
  navShowScrollUp: 5,
  criticalImages: ["/assets/root-canal-illustration.svg", "/assets/hero-bg.svg"]
} as const;

export const VALIDATORS = {
  email: /^[^\s@]+@[^\s@]+\.[^\s@]+$/,
  phone: /^[\+]?[(]?[\d\s\-\(\)]{10,}$/,
  name: /^[a-zA-ZáéíóúÁÉÍÓÚñÑ\s]{2,}$/
} as const;

export const MESSAGES = {
  required: "Este campo es obligatorio",
  email: "Por favor, ingrese un email válido",
  phone: "Por favor, ingrese un teléfono válido",
  name: "El nombre debe tener al menos 2 caracteres",
  details: "Por favor, proporcione más detalles (mínimo 10 caracteres)",
  fieldOk: "✓",
  fixErrors: "Por favor, corrija los errores antes de continuar",
  sending: "Enviando...",
  sent: "¡Mensaje enviado exitosamente! Nos contactaremos contigo pronto.",
  failed: "Ha ocurrido un error. Por favor, intente nuevamente."
} as const;
