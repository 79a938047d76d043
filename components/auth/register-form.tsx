"use client";

import { useState, type FormEvent } from "react";
import { useRouter } from "next/navigation";
import { toast } from "sonner";
import { isApiError } from "@/lib/api/error-types";

export function RegisterForm() {
  const router = useRouter();
  const [username, setUsername] = useState("");
  const [email, setEmail] = useState("");
  const [password, setPassword] = useState("");
  const [errors, setErrors] = useState<Record<string, string[]>>({});
  const [submitting, setSubmitting] = useState(false);

  const handleSubmit = async (event: FormEvent<HTMLFormElement>) => {
    event.preventDefault();
    setSubmitting(true);
    setErrors({});
    try {
      const res = await fetch("/api/auth/register", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ username, email, password }),
      });
      if (!res.ok) {
        const body: unknown = await res.json().catch(() => null);
        setErrors(isApiError(body) && body.details ? body.details : { body: ["Registration failed"] });
        return;
      }
      toast.success("Account created. You can sign in now.");
      router.push("/login");
    } catch {
      setErrors({ body: ["Registration failed"] });
    } finally {
      setSubmitting(false);
    }
  };

  const fieldError = (name: string) =>
    errors[name]?.map((message) => (
      <p key={message} className="text-xs text-destructive">
        {message}
      </p>
    ));

  return (
    <form onSubmit={(e) => void handleSubmit(e)} className="space-y-4 w-full max-w-sm">
      <div className="space-y-1">
        <label htmlFor="username" className="block text-sm font-medium">Username</label>
        <input
          id="username"
          value={username}
          onChange={(e) => setUsername(e.target.value)}
          required
          className="w-full rounded border border-border px-3 py-2 text-sm"
        />
        {fieldError("username")}
      </div>
      <div className="space-y-1">
        <label htmlFor="email" className="block text-sm font-medium">Email</label>
        <input
          id="email"
          type="email"
          value={email}
          onChange={(e) => setEmail(e.target.value)}
          className="w-full rounded border border-border px-3 py-2 text-sm"
        />
        {fieldError("email")}
      </div>
      <div className="space-y-1">
        <label htmlFor="password" className="block text-sm font-medium">Password</label>
        <input
          id="password"
          type="password"
          autoComplete="new-password"
          value={password}
          onChange={(e) => setPassword(e.target.value)}
          required
          className="w-full rounded border border-border px-3 py-2 text-sm"
        />
        {fieldError("password")}
      </div>
      {fieldError("body")}
      <button
        type="submit"
        disabled={submitting}
        className="w-full rounded bg-primary px-3 py-2 text-sm font-medium text-primary-foreground disabled:opacity-50"
      >
        Create account
      </button>
    </form>
  );
}
