import { ShieldAlert } from "lucide-react";

export function AccessDenied({ message }: { message: string }) {
  return (
    <div role="alert" className="flex flex-col items-center gap-3 py-24 text-center">
      <ShieldAlert className="h-8 w-8 text-destructive" />
      <p className="text-sm text-muted-foreground">{message}</p>
    </div>
  );
}
