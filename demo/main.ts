import { runAnalysisFromForm, setInputMode } from "./form.js";

const tabPair = document.querySelector<HTMLDivElement>("#tab-pair");
const tabBulk = document.querySelector<HTMLDivElement>("#tab-bulk");
const analyzeButton = document.querySelector<HTMLButtonElement>("#analyze-btn");

tabPair?.addEventListener("click", () => setInputMode(document, "pairs"));
tabBulk?.addEventListener("click", () => setInputMode(document, "columns"));

analyzeButton?.addEventListener("click", () => {
  runAnalysisFromForm(document);
});

setInputMode(document, "pairs");
