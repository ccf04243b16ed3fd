export { rtfToEmailBody, rtfToPlainText } from "./body.js";
