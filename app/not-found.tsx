import Link from "next/link";
import { MapPinOff } from "lucide-react";

export default function NotFound() {
  return (
    <main className="mx-auto flex min-h-[50vh] max-w-md flex-col items-center justify-center gap-3 px-6 text-center">
      <MapPinOff className="h-8 w-8 text-muted-foreground" />
      <h1 className="text-lg font-semibold">Nothing here</h1>
      <p className="text-sm text-muted-foreground">
        The page or profile you asked for does not exist, or you cannot see it.
      </p>
      <Link href="/" className="text-sm font-medium text-primary hover:underline">
        Back to your profile
      </Link>
    </main>
  );
}
