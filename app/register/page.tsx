import { notFound } from "next/navigation";
import { SELF_REGISTRATION } from "@/lib/feature-flags";
import { RegisterForm } from "@/components/auth/register-form";

export default function RegisterPage() {
  if (!SELF_REGISTRATION) notFound();

  return (
    <main className="flex flex-col items-center gap-6 px-6 py-16">
      <h1 className="text-xl font-semibold">Create an account</h1>
      <RegisterForm />
    </main>
  );
}
