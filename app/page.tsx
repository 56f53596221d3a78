import NotesForm from "./notes-form";

export default function Home() {
  return (
    <div>
      <h1 className="mb-2 text-2xl font-semibold tracking-tight">
        PDF to study notes
      </h1>
      <p className="mb-6 text-sm text-muted">
        Upload a PDF and pick a topic. The text is sent to OpenAI with your
        own API key; the key is used for this request only.
      </p>
      <NotesForm />
    </div>
  );
}
