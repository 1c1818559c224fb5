import { createComposer, serialize } from "../../src/index.js";

const composer = createComposer({ debug: true });

const res = composer.compose([
  "name=pathwright",
  "version:1",
  "tags.0=json",
  "tags.1=cli",
  'owner."display name"=Test User',
]);

if (res.ok) {
  console.log(res.document ? serialize(res.document) : "(no document)");
  console.log(res.meta);
} else {
  console.error(res.error.message);
}

// the same batch with a gap in the array
const broken = composer.compose(["tags.0=json", "tags.2=cli"]);
if (!broken.ok) console.error(broken.error.message);
