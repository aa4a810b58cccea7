import { ORDER_STATUSES, PAYMENT_STATUSES } from "../orders/model";
import type { FormValues } from "../orders/forms";

interface FieldProps {
  name: string;
  label: string;
  values: FormValues;
  invalid: readonly string[];
}

function fieldClass(name: string, invalid: readonly string[]): string {
  return invalid.includes(name) ? "field invalid" : "field";
}

export function TextField({
  name,
  label,
  values,
  invalid,
  type = "text",
  step,
  min,
}: FieldProps & { type?: "text" | "number" | "date"; step?: string; min?: string }) {
  return (
    <label className={fieldClass(name, invalid)}>
      <span>{label}</span>
      <input type={type} name={name} defaultValue={values[name] ?? ""} step={step} min={min} />
    </label>
  );
}

export function SelectField({
  name,
  label,
  values,
  invalid,
  options,
}: FieldProps & { options: readonly string[] }) {
  return (
    <label className={fieldClass(name, invalid)}>
      <span>{label}</span>
      <select name={name} defaultValue={values[name] ?? options[0]}>
        {options.map((option) => (
          <option key={option} value={option}>
            {option}
          </option>
        ))}
      </select>
    </label>
  );
}

export interface OrderFieldsProps {
  values: FormValues;
  invalid?: readonly string[];
  /** Add form takes several names in a text area; edit form a single line */
  variant: "add" | "edit";
}

export function OrderFields({ values, invalid = [], variant }: OrderFieldsProps) {
  const common = { values, invalid };
  const priceMin = variant === "add" ? "0" : undefined;

  return (
    <>
      <div className="columns">
        <TextField name="customerName" label="Customer Name" {...common} />
        <TextField name="number" label="Contact Number" {...common} />
      </div>
      {variant === "add" ?
        <label className={fieldClass("orders", invalid)}>
          <span>Order Name(s)</span>
          <textarea name="orders" rows={3} defaultValue={values.orders ?? ""} />
        </label>
      : <TextField name="order" label="Order" {...common} />}
      <TextField
        name="quantity"
        label="Quantity"
        type="number"
        step="1"
        min={variant === "add" ? "1" : undefined}
        {...common}
      />
      <TextField name="nameset" label="Nameset" {...common} />
      <div className="columns">
        <TextField name="costPrice" label="Cost Price" type="number" step="0.1" min={priceMin} {...common} />
        <TextField name="salePrice" label="Sale Price" type="number" step="0.1" min={priceMin} {...common} />
      </div>
      <SelectField name="orderStatus" label="Order Status" options={ORDER_STATUSES} {...common} />
      <SelectField name="paymentStatus" label="Payment Status" options={PAYMENT_STATUSES} {...common} />
      <TextField
        name="trackingDetail"
        label={variant === "add" ? "Tracking Info (if any)" : "Tracking Info"}
        {...common}
      />
      {variant === "edit" && <TextField name="date" label="Order Date" type="date" {...common} />}
    </>
  );
}
