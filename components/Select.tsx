"use client";
import React from "react";

type Option<V extends string> = { value: V; label: string };

interface SelectProps<V extends string> {
  value: V;
  onChange: (value: V) => void;
  options: Option<V>[];
  label?: string;
  className?: string;
  disabled?: boolean;
  id?: string;
}

export function Select<V extends string>({
  value,
  onChange,
  options,
  label,
  className = "",
  disabled,
  id,
}: SelectProps<V>) {
  function handleChange(e: React.ChangeEvent<HTMLSelectElement>) {
    const picked = options.find((o) => o.value === e.target.value);
    if (picked) onChange(picked.value);
  }

  return (
    <div className={`relative ${className}`}>
      {label && (
        <label htmlFor={id} className="block text-sm mb-1">
          {label}
        </label>
      )}
      <select
        id={id}
        value={value}
        disabled={disabled}
        onChange={handleChange}
        className="appearance-none w-full rounded-md border border-white/20 bg-white/5 text-white px-3 py-2 pr-8
                   hover:bg-white/10 focus:outline-none focus:ring-2 focus:ring-blue-500/50 focus:border-blue-400/40
                   disabled:opacity-60"
      >
        {options.map((o) => (
          <option key={o.value} value={o.value} className="bg-slate-900 text-white">
            {o.label}
          </option>
        ))}
      </select>
    </div>
  );
}
