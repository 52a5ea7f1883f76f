// src/slides.ts — Slide deck rendering for `mode: slides` documents
// Each level-1 heading starts a slide; anything before the first one joins it.

import type { Token } from "marked";
import { inlineScript, inlineStyle } from "./assets.js";
import { renderTokens, rewriteMermaidBlocks } from "./markdown.js";

export function splitSlides(tokens: Token[]): Token[][] {
  const slides: Token[][] = [];
  let current: Token[] = [];
  const pending: Token[] = [];
  let seenH1 = false;

  for (const token of tokens) {
    if (token.type === "heading" && token.depth === 1) {
      if (!seenH1) {
        seenH1 = true;
        current.push(...pending);
        pending.length = 0;
      } else if (current.length > 0) {
        slides.push(current);
        current = [];
      }
      current.push(token);
    } else if (seenH1) {
      current.push(token);
    } else {
      pending.push(token);
    }
  }

  if (seenH1) {
    if (current.length > 0) slides.push(current);
  } else {
    slides.push(pending);
  }
  return slides;
}

export function renderSlides(tokens: Token[]): string {
  const slides = splitSlides(tokens);
  const count = slides.length;
  let html = `<div class="slides-root" data-slide-count="${count}" tabindex="0">`;

  slides.forEach((slide, index) => {
    const body = rewriteMermaidBlocks(renderTokens(slide));
    const active = index === 0 ? " is-active" : "";
    const hidden = index === 0 ? "" : ' aria-hidden="true"';
    html += `<section class="slide${active}" id="slide-${index + 1}" data-slide="${index + 1}"${hidden}>`;
    html += body;
    html += "</section>";
  });

  html += `<div class="slides-progress">1 / ${count}</div>`;
  html += "</div>";
  return html;
}

export function slidesExtraHead(): string {
  return '<script>\ndocument.documentElement.classList.add("slides-mode");\n</script>\n' + inlineStyle("slides.css");
}

export function slidesExtraBody(): string {
  return inlineScript("slides.js");
}
