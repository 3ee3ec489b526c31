import { decodeShareText, encodeShareText } from "../lib/share";

const input = new TextEncoder().encode(process.argv[2] ?? "abracadabra");
const text = encodeShareText(input);
const decoded = new TextDecoder().decode(decodeShareText(text));
console.log(JSON.stringify({ inputLen: input.byteLength, textLen: text.length, text, decoded }));
