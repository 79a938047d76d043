import { SELF_REGISTRATION } from "@/lib/feature-flags";
import { LoginForm } from "@/components/auth/login-form";

type PageProps = { searchParams: Promise<{ next?: string | string[] }> };

export default async function LoginPage({ searchParams }: PageProps) {
  const { next } = await searchParams;

  return (
    <main className="flex flex-col items-center gap-6 px-6 py-16">
      <h1 className="text-xl font-semibold">Sign in</h1>
      <LoginForm next={typeof next === "string" ? next : undefined} allowRegistration={SELF_REGISTRATION} />
    </main>
  );
}
