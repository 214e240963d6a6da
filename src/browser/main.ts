import {
  AnimationController,
  FormEnhancer,
  FormValidator,
  ModalSystem,
  PerformanceOptimizer,
  SmoothScroll,
  startSite
} from "./index.js";

declare global {
  interface Window {
    EndodonciaAnimations?: {
      AnimationController: typeof AnimationController;
      FormEnhancer: typeof FormEnhancer;
      FormValidator: typeof FormValidator;
      ModalSystem: typeof ModalSystem;
      SmoothScroll: typeof SmoothScroll;
      PerformanceOptimizer: typeof PerformanceOptimizer;
    };
  }
}

window.addEventListener("load", () => {
  startSite();
});

window.EndodonciaAnimations = {
  AnimationController,
  FormEnhancer,
  FormValidator,
  ModalSystem,
  SmoothScroll,
  PerformanceOptimizer
};
